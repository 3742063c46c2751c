import { basename } from 'path';

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

function stringField(input: Record<string, unknown>, key: string): string {
  const value = input[key];
  return typeof value === 'string' ? value : '';
}

/**
 * One-line description of what a worker is doing, from a PostToolUse event.
 */
export function inferActivity(toolName: string, toolInput: Record<string, unknown>): string {
  switch (toolName) {
    case 'Read': {
      const filePath = stringField(toolInput, 'file_path');
      return filePath ? `reading ${basename(filePath)}` : 'reading file';
    }
    case 'Edit':
    case 'Write': {
      const filePath = stringField(toolInput, 'file_path');
      return filePath ? `editing ${basename(filePath)}` : 'editing file';
    }
    case 'Bash': {
      const command = stringField(toolInput, 'command');
      return command ? `running: ${truncate(command, 40)}` : 'running command';
    }
    case 'Grep': {
      const pattern = stringField(toolInput, 'pattern');
      return pattern ? `searching: ${truncate(pattern, 30)}` : 'searching';
    }
    case 'Glob': {
      const pattern = stringField(toolInput, 'pattern');
      return pattern ? `finding: ${pattern}` : 'finding files';
    }
    case 'Task':
      return 'spawning subtask';
    default:
      return toolName.toLowerCase();
  }
}
