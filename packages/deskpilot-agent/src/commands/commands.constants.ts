export const MAX_INSTRUCTION_LENGTH = 500;

export const MIN_INSTRUCTION_TOKENS = 2;

// Matched case-insensitively anywhere in the line
export const DESTRUCTIVE_INSTRUCTION_PATTERNS = [
  'rm -rf',
  'del /f /s /q',
  'format c:',
  'shutdown /s',
  'reboot',
  'reg delete',
  'rd /s /q',
  'drop database',
  'drop table',
  'kill -9',
  'taskkill /f',
] as const;

export const PROCESSED_MARKER = '# Processed at ';

export const DEFAULT_COMMANDS_FILE_CONTENT = `# Desktop Automation Commands
# Add your commands here, one per line
# Lines starting with # are comments and will be ignored
# Examples:
# open notepad
# type hello world
# press enter
# click on file menu

# Your commands:
`;
