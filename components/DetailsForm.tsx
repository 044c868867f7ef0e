import React, { useState } from 'react';
import { Box, Text } from 'ink';
import TextInput from 'ink-text-input';
import SelectInput from 'ink-select-input';
import type { SessionDetails } from '../types';
import { fieldError, INFESTATION_LEVELS, validateSessionDetails } from '../lib/userInput';

interface DetailsFormProps {
  defaultPlant?: string;
  onSubmit: (details: SessionDetails) => void;
}

type Field = 'plantType' | 'zipcode' | 'infestationLevel';

interface LevelItem {
  label: string;
  value: (typeof INFESTATION_LEVELS)[number];
}

const LEVEL_ITEMS: LevelItem[] = INFESTATION_LEVELS.map(level => ({ label: level, value: level }));
const DEFAULT_LEVEL_INDEX = INFESTATION_LEVELS.indexOf('medium');

/** Plant, zip code, then infestation level; a field is re-prompted until it validates. */
const DetailsForm: React.FC<DetailsFormProps> = ({ defaultPlant, onSubmit }) => {
  const [field, setField] = useState<Field>('plantType');
  const [plantType, setPlantType] = useState(defaultPlant && defaultPlant !== 'Unknown' ? defaultPlant : '');
  const [zipcode, setZipcode] = useState('');
  const [error, setError] = useState<string | null>(null);

  const submitText = (name: 'plantType' | 'zipcode', next: Field) => (value: string) => {
    const problem = fieldError(name, value);
    setError(problem);
    if (!problem) setField(next);
  };

  const handleLevel = (item: LevelItem) => {
    const result = validateSessionDetails({ plantType, zipcode, infestationLevel: item.value });
    if (!result.success) {
      setError(result.error);
      setField(fieldError('zipcode', zipcode) ? 'zipcode' : 'plantType');
      return;
    }
    setError(null);
    onSubmit(result.details);
  };

  return (
    <Box flexDirection="column" marginTop={1}>
      <Text bold>📝 Get Personalized Treatment Plan</Text>
      <Box>
        <Text color={field === 'plantType' ? 'green' : undefined}>Plant/Crop: </Text>
        {field === 'plantType'
          ? <TextInput value={plantType} onChange={setPlantType} onSubmit={submitText('plantType', 'zipcode')} placeholder="e.g., tomato" />
          : <Text>{plantType}</Text>}
      </Box>
      {field !== 'plantType' && (
        <Box>
          <Text color={field === 'zipcode' ? 'green' : undefined}>Zip Code: </Text>
          {field === 'zipcode'
            ? <TextInput value={zipcode} onChange={setZipcode} onSubmit={submitText('zipcode', 'infestationLevel')} placeholder="e.g., 92336" />
            : <Text>{zipcode}</Text>}
        </Box>
      )}
      {field === 'infestationLevel' && (
        <Box flexDirection="column">
          <Text color="green">Infestation Level:</Text>
          <SelectInput items={LEVEL_ITEMS} initialIndex={DEFAULT_LEVEL_INDEX} onSelect={handleLevel} />
        </Box>
      )}
      {error ? <Text color="red">{error}</Text> : null}
    </Box>
  );
};

export default DetailsForm;
