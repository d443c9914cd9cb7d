const ANSI_YELLOW = '\u001b[33m';
const ANSI_RED = '\u001b[31m';
const ANSI_RESET = '\u001b[0m';

export function logWarning(message: string): void {
  console.warn(`${ANSI_YELLOW}Warning: ${message}${ANSI_RESET}`);
}

export function logError(message: string): void {
  console.error(`${ANSI_RED}Error: ${message}${ANSI_RESET}`);
}
