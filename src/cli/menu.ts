/**
 * Start menu shown before an interactive update.
 * The prompt is a port so the update command can be exercised without a TTY.
 */

import * as clack from "@clack/prompts";

export type MenuChoice = "start" | "help" | "exit";

export interface MenuPrompt {
  selectStartAction(): Promise<MenuChoice>;
}

const MENU_OPTIONS: Array<{ value: MenuChoice; label: string }> = [
  { value: "start", label: "Start" },
  { value: "help", label: "Help" },
  { value: "exit", label: "Exit" },
];

export function createClackMenuPrompt(): MenuPrompt {
  return {
    async selectStartAction(): Promise<MenuChoice> {
      const result = await clack.select({
        message: "What would you like to do?",
        options: MENU_OPTIONS,
      });

      // Ctrl+C / Escape behaves like Exit.
      if (clack.isCancel(result)) {
        return "exit";
      }
      return isMenuChoice(result) ? result : "exit";
    },
  };
}

function isMenuChoice(value: unknown): value is MenuChoice {
  return MENU_OPTIONS.some((option) => option.value === value);
}
