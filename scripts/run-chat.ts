import { createInterface } from 'node:readline';
import { loadConfig } from '@searchwise/schemas/src/config-loader.js';
import { createChatCommands, HELP_LINES } from '@searchwise/core/src/orchestration/chat-commands.js';
import { createServices } from '@searchwise/core/src/orchestration/create-services.js';

async function main(): Promise<void> {
  const config = await loadConfig({ configPath: process.env['SEARCHWISE_CONFIG'] });
  const { orchestrator, transcriptStore } = createServices(config);

  console.log('=== Searchwise Chat ===\n');
  console.log(`Model: ${config.chat.model}`);
  console.log(`Mock clients: ${config.mock ? 'yes' : 'no'}`);
  console.log(`Auto search: ${config.autoSearch ? 'on' : 'off'}`);
  console.log(`Transcripts: ${config.transcriptDir}`);
  HELP_LINES.forEach((line) => console.log(line));

  const commands = createChatCommands({
    orchestrator,
    transcriptStore,
    print: (line) => console.log(`\n${line}`),
  });

  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const prompt = (question: string): Promise<string> =>
    new Promise((resolve) => {
      rl.question(question, resolve);
    });

  try {
    for (;;) {
      const input = await prompt('\nYou: ');
      if ((await commands.handle(input)) === 'exit') {
        break;
      }
    }
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ERR_USE_AFTER_CLOSE') {
      // readline closed by Ctrl+C
    } else {
      throw error;
    }
  } finally {
    rl.close();
  }

  console.log('\n=== Chat ended ===');
}

main().catch((error: unknown) => {
  console.error('Chat failed:', error);
  process.exit(1);
});
