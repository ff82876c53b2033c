import { createChildLogger } from '@searchwise/shared/src/logger.js';
import type { ChatSessionState } from '@searchwise/shared/src/types/chat.types.js';
import { SearchwiseError } from '@searchwise/shared/src/utils/errors.js';
import type { TranscriptStore } from '../session/transcript-store.js';
import { messageCount } from '../session/transcript.js';
import { clearTranscript, createSessionState, type ChatOrchestrator } from './chat-orchestrator.js';

const log = createChildLogger('orchestration:commands');

const EXIT_KEYWORDS = ['exit', 'quit', '終了'];

export const HELP_LINES: readonly string[] = [
  'Commands:',
  '  /search <query>  Search the web and show the results',
  '  /explain         Ask the assistant to explain the last search',
  '  /save [name]     Save the transcript',
  '  /clear           Clear the transcript',
  '  exit | quit      Leave',
];

export type CommandResult = 'continue' | 'exit';

export interface ChatCommands {
  handle(input: string): Promise<CommandResult>;
  state(): ChatSessionState;
}

export interface ChatCommandsDeps {
  readonly orchestrator: ChatOrchestrator;
  readonly transcriptStore: TranscriptStore;
  readonly print: (line: string) => void;
}

/** `/save notes` stores `notes.json`. */
export function toTranscriptFileName(name: string): string | undefined {
  if (!name) {
    return undefined;
  }
  return name.endsWith('.json') ? name : `${name}.json`;
}

function commandArgument(input: string, command: string): string | undefined {
  if (input === command) {
    return '';
  }
  return input.startsWith(`${command} `) ? input.slice(command.length).trim() : undefined;
}

/**
 * Interprets one line of the terminal chat. Errors from the search, chat and
 * transcript layers are printed and the session carries on.
 */
export function createChatCommands(
  deps: ChatCommandsDeps,
  initialState: ChatSessionState = createSessionState(),
): ChatCommands {
  const { orchestrator, transcriptStore, print } = deps;
  let current = initialState;

  async function run(input: string): Promise<void> {
    if (input === '/help') {
      HELP_LINES.forEach((line) => print(line));
      return;
    }

    const searchText = commandArgument(input, '/search');
    if (searchText !== undefined) {
      if (!searchText) {
        print('Usage: /search <query>');
        return;
      }
      const result = await orchestrator.search(current, searchText);
      current = result.state;
      print(result.search.markdown);
      print(`(${result.search.summary})`);
      return;
    }

    if (input === '/explain') {
      const result = await orchestrator.explainLastSearch(current);
      current = result.state;
      print(`Assistant: ${result.reply}`);
      return;
    }

    const saveName = commandArgument(input, '/save');
    if (saveName !== undefined) {
      const saved = await transcriptStore.save(current.transcript, toTranscriptFileName(saveName));
      print(`Saved ${String(messageCount(current.transcript))} messages to ${saved}`);
      return;
    }

    if (input === '/clear') {
      current = clearTranscript(current);
      print('Transcript cleared.');
      return;
    }

    const result = await orchestrator.handleTurn(current, input);
    current = result.state;
    if (result.search) {
      print(`[${result.search.summary}]`);
    }
    print(`Assistant: ${result.reply}`);
  }

  return {
    async handle(rawInput: string): Promise<CommandResult> {
      const input = rawInput.trim();
      if (EXIT_KEYWORDS.includes(input.toLowerCase())) {
        return 'exit';
      }
      if (!input) {
        return 'continue';
      }

      try {
        await run(input);
      } catch (error) {
        if (!(error instanceof SearchwiseError)) {
          throw error;
        }
        log.warn({ code: error.code, error: error.message }, 'Chat command failed');
        if (error.code === 'NO_SEARCH_RESULTS') {
          print('No successful search yet. Try /search <query> first.');
        } else {
          print(`Error: ${error.message}`);
        }
      }
      return 'continue';
    },

    state: () => current,
  };
}
