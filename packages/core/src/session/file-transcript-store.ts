import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { createChildLogger } from '@searchwise/shared/src/logger.js';
import type { ChatTranscript } from '@searchwise/shared/src/types/chat.types.js';
import { PersistenceError, SchemaValidationError } from '@searchwise/shared/src/utils/errors.js';
import { validateTranscript } from '@searchwise/schemas/src/validators.js';
import { defaultTranscriptName } from './transcript-store.js';
import type { TranscriptStore } from './transcript-store.js';

const log = createChildLogger('session:file-transcript-store');

const SAFE_NAME = /^[\w.-]+\.json$/;

export interface FileTranscriptStoreConfig {
  readonly directory: string;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** Names are plain file names inside the store directory, ending in `.json`. */
function assertSafeName(name: string): void {
  if (!SAFE_NAME.test(name) || name.startsWith('.')) {
    throw new PersistenceError(`Invalid transcript name: ${name}`, 'INVALID_TRANSCRIPT_NAME');
  }
}

export function createFileTranscriptStore(config: FileTranscriptStoreConfig): TranscriptStore {
  const { directory } = config;

  return {
    async save(transcript: ChatTranscript, name?: string): Promise<string> {
      const fileName = name ?? defaultTranscriptName();
      assertSafeName(fileName);

      try {
        await mkdir(directory, { recursive: true });
        await writeFile(path.join(directory, fileName), JSON.stringify(transcript, null, 2), 'utf-8');
      } catch (error) {
        throw new PersistenceError(
          `Failed to save transcript ${fileName}: ${toError(error).message}`,
          'PERSISTENCE_ERROR',
          toError(error),
        );
      }

      log.info({ fileName, messageCount: transcript.length }, 'Transcript saved');
      return fileName;
    },

    async load(name: string): Promise<ChatTranscript> {
      assertSafeName(name);

      let content: string;
      try {
        content = await readFile(path.join(directory, name), 'utf-8');
      } catch (error) {
        if (isMissingFile(error)) {
          throw new PersistenceError(`Transcript not found: ${name}`, 'TRANSCRIPT_NOT_FOUND');
        }
        throw new PersistenceError(
          `Failed to read transcript ${name}: ${toError(error).message}`,
          'PERSISTENCE_ERROR',
          toError(error),
        );
      }

      let data: unknown;
      try {
        data = JSON.parse(content);
      } catch (error) {
        throw new PersistenceError(`Transcript ${name} is not valid JSON`, 'INVALID_TRANSCRIPT', toError(error));
      }

      try {
        return validateTranscript(data);
      } catch (error) {
        if (error instanceof SchemaValidationError) {
          throw new PersistenceError(
            `Transcript ${name} has an invalid shape: ${error.validationErrors.join(', ')}`,
            'INVALID_TRANSCRIPT',
            error,
          );
        }
        throw error;
      }
    },

    async list(): Promise<string[]> {
      try {
        const entries = await readdir(directory);
        return entries.filter((entry) => SAFE_NAME.test(entry)).sort();
      } catch (error) {
        if (isMissingFile(error)) {
          return [];
        }
        throw new PersistenceError(
          `Failed to list transcripts: ${toError(error).message}`,
          'PERSISTENCE_ERROR',
          toError(error),
        );
      }
    },
  };
}
