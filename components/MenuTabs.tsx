import React, { useState } from 'react';
import { Box, Text } from 'ink';
import SelectInput from 'ink-select-input';
import TextInput from 'ink-text-input';
import { isMenuOption, MENU_LABELS } from '../session/menuDispatcher';
import type { MenuOption, MenuSelector } from '../session/menuDispatcher';

type MenuValue = `${MenuOption}` | 'question' | 'reset' | 'exit';

interface MenuItem {
  label: string;
  value: MenuValue;
}

export const MENU_ITEMS: MenuItem[] = [
  { label: `🪨 ${MENU_LABELS[2]}`, value: '2' },
  { label: `🌤️ ${MENU_LABELS[3]}`, value: '3' },
  { label: `👀 ${MENU_LABELS[4]}`, value: '4' },
  { label: `📄 ${MENU_LABELS[5]}`, value: '5' },
  { label: '💬 Ask Question', value: 'question' },
  { label: '← New Analysis', value: 'reset' },
  { label: 'Exit', value: 'exit' },
];

interface MenuTabsProps {
  onSelect: (selector: MenuSelector) => void;
  onReset: () => void;
  onExit: () => void;
}

const MenuTabs: React.FC<MenuTabsProps> = ({ onSelect, onReset, onExit }) => {
  const [isAsking, setIsAsking] = useState(false);
  const [question, setQuestion] = useState('');

  const handleSelect = (item: MenuItem) => {
    switch (item.value) {
      case 'question':
        setIsAsking(true);
        return;
      case 'reset':
        onReset();
        return;
      case 'exit':
        onExit();
        return;
      default: {
        const option = Number(item.value);
        if (isMenuOption(option)) onSelect(option);
      }
    }
  };

  const handleQuestion = (text: string) => {
    const trimmed = text.trim();
    if (!trimmed) return;
    setIsAsking(false);
    setQuestion('');
    onSelect({ question: trimmed });
  };

  return (
    <Box flexDirection="column" marginTop={1}>
      <Text bold>What else would you like to know?</Text>
      {isAsking ? (
        <Box>
          <Text color="green">Ask a custom question: </Text>
          <TextInput value={question} onChange={setQuestion} onSubmit={handleQuestion} />
        </Box>
      ) : (
        <SelectInput items={MENU_ITEMS} onSelect={handleSelect} />
      )}
    </Box>
  );
};

export default MenuTabs;
