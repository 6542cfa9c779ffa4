/**
 * Terminal chat input classification
 */

export type ReplInput =
  | { kind: 'empty' }
  | { kind: 'quit' }
  | { kind: 'clear' }
  | { kind: 'message'; text: string };

const QUIT_COMMANDS = new Set(['quit', 'exit', '/quit', '/exit', '/q']);

/**
 * Classify one line typed at the chat prompt
 */
export function parseReplInput(line: string): ReplInput {
  const text = line.trim();

  if (!text) {
    return { kind: 'empty' };
  }

  const command = text.toLowerCase();
  if (QUIT_COMMANDS.has(command)) {
    return { kind: 'quit' };
  }
  if (command === '/clear') {
    return { kind: 'clear' };
  }

  return { kind: 'message', text };
}
