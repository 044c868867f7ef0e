import React from "react";
import { describe, it, expect, vi } from "vitest";
import { render } from "ink-testing-library";
import MenuTabs, { MENU_ITEMS } from "./MenuTabs";

describe("MenuTabs", () => {
  it("offers the four menu options, a question and navigation", () => {
    expect(MENU_ITEMS.map(item => item.value)).toEqual(["2", "3", "4", "5", "question", "reset", "exit"]);
  });

  it("renders every item", () => {
    const { lastFrame } = render(<MenuTabs onSelect={vi.fn()} onReset={vi.fn()} onExit={vi.fn()} />);
    const frame = lastFrame() ?? "";

    for (const label of ["Soil Impact", "Weather Timing", "Monitoring", "Full Report", "Ask Question", "Exit"]) {
      expect(frame).toContain(label);
    }
  });
});
