/* FILE: src/config.ts */
// src/config.ts

import { fileURLToPath } from 'node:url';

// Runtime settings. Physical constants live in constants.ts.
export const CONFIG = {
  // --- Core Settings ---
  LOG_LEVEL: process.env.ELEMENTAL_UNITS_LOG_LEVEL ?? 'WARN', // DEBUG while investigating, WARN keeps CLI output clean
  MAX_LOG_BUFFER_SIZE: 20000, // Max number of log lines kept in memory

  // --- Reference Data ---
  ELEMENT_TABLE_PATH: fileURLToPath(new URL('./data/elements.json', import.meta.url)),

  // --- Conversion ---
  DEFAULT_VALUE: 1, // A request without a value yields the conversion factor
  RESULT_DIGITS: 6, // Digits after the decimal point in scientific output
  MASS_DIGITS: 6,

  // --- Prompt ---
  PROMPT: '> ',
  EXIT_COMMANDS: ['exit', 'quit'],
  HELP_COMMANDS: ['help', '?'],
  LIST_COMMANDS: ['list'],
  LINE_BREAK: '------------------------------',
};
