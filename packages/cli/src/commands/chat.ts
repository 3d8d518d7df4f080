import { Command } from 'commander';
import { createInterface } from 'node:readline/promises';
import chalk from 'chalk';
import {
  assertModel,
  createBlender,
  createCompletionClient,
  loadConfig,
  TurnRunner,
  type ProcessingState,
} from '@mindloop/core';
import { errorMessage, openWorkspace, type Workspace } from '../context.js';

const EXIT_WORDS = new Set(['exit', 'quit', ':q']);

function showProgress(state: ProcessingState): void {
  if (state === 'idle') {
    process.stderr.write('\r\x1b[K');
    return;
  }
  process.stderr.write(`\r\x1b[K${chalk.gray(`  ${state}...`)}`);
}

function conversationFor(ws: Workspace, opts: { conversation?: string; new?: boolean }, firstMessage: string): string {
  if (opts.conversation) {
    if (!ws.conversations.get(opts.conversation)) throw new Error(`Conversation ${opts.conversation} not found`);
    return opts.conversation;
  }
  const latest = opts.new ? undefined : ws.conversations.list()[0];
  if (latest) return latest.id;

  const created = ws.conversations.create(firstMessage.slice(0, 60) || 'New Chat');
  ws.activity.append('conversation_created', `Conversation: ${created.title}`, created.id);
  return created.id;
}

async function turn(runner: TurnRunner, conversationId: string, message: string): Promise<void> {
  const ctrl = new AbortController();
  const onInterrupt = () => ctrl.abort();
  process.once('SIGINT', onInterrupt);
  try {
    const result = await runner.run(conversationId, message, { signal: ctrl.signal, onProgress: showProgress });
    console.log();
    console.log(result.reply);
    console.log();
    console.log(chalk.gray(result.displayText.slice(result.reply.length).trim()));
    console.log();
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

export const chatCommand = new Command('chat')
  .description('Send one message, or start an interactive session when no message is given')
  .argument('[message]', 'Message to send')
  .option('-c, --conversation <id>', 'Conversation id (default: most recent)')
  .option('-n, --new', 'Start a new conversation')
  .option('-m, --model <model>', 'Model for this conversation from now on')
  .option('-r, --root <path>', 'Data root (default: MINDLOOP_ROOT or current directory)')
  .action(async (message: string | undefined, opts: { conversation?: string; new?: boolean; model?: string; root?: string }) => {
    try {
      const config = loadConfig();
      const model = opts.model === undefined ? undefined : assertModel(config.provider, opts.model);
      const ws = openWorkspace({ root: opts.root ?? config.dataRoot });
      const runner = new TurnRunner({
        client: createCompletionClient(config),
        temperatures: ws.settings,
        history: ws.conversations,
        settings: ws.settings,
        dayDream: config.dayDream,
        blender: createBlender({ dayDreamRule: config.dayDreamRule }),
        onActivity: ws.activity.sink(),
      });

      if (message !== undefined) {
        const id = conversationFor(ws, opts, message);
        if (model) ws.settings.update(id, { model });
        await turn(runner, id, message);
        console.log(chalk.gray(`Conversation: ${id}`));
        return;
      }

      const rl = createInterface({ input: process.stdin, output: process.stdout });
      let id: string | undefined;
      console.log(chalk.gray('Type a message, or "exit" to leave.'));
      try {
        for (;;) {
          const line = (await rl.question(chalk.cyan('you> '))).trim();
          if (EXIT_WORDS.has(line.toLowerCase())) break;
          if (!line) continue;
          if (!id) {
            id = conversationFor(ws, opts, line);
            if (model) ws.settings.update(id, { model });
          }
          try {
            await turn(runner, id, line);
          } catch (err) {
            console.error(chalk.red('Turn failed:'), errorMessage(err));
          }
        }
      } finally {
        rl.close();
      }
      if (id) console.log(chalk.gray(`Conversation: ${id}`));
    } catch (err) {
      console.error(chalk.red('Error:'), errorMessage(err));
      process.exit(1);
    }
  });
