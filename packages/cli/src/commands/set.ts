import { Command } from 'commander';
import chalk from 'chalk';
import { AGENT_ROLES, formatTemperatureLine, type AgentRole } from '@mindloop/core';
import { errorMessage, openWorkspace, pickConversation } from '../context.js';

/** Role names match case-insensitively; the value must lie in [0, 1]. */
export function parseRoleValue(role: string, value: string): { role: AgentRole; value: number } {
  const match = AGENT_ROLES.find((r) => r.toLowerCase() === role.trim().toLowerCase());
  if (!match) throw new Error(`Unknown agent "${role}". Agents: ${AGENT_ROLES.join(', ')}`);
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new Error(`Temperature must be a number from 0 to 1, got "${value}"`);
  }
  return { role: match, value: parsed };
}

export const setCommand = new Command('set')
  .description('Set one agent\'s temperature on a conversation')
  .argument('<agent>', `One of ${AGENT_ROLES.join(', ')}`)
  .argument('<value>', 'Temperature from 0 to 1')
  .option('-c, --conversation <id>', 'Conversation id (default: most recent)')
  .option('-r, --root <path>', 'Data root (default: MINDLOOP_ROOT or current directory)')
  .action((agent: string, value: string, opts: { conversation?: string; root?: string }) => {
    try {
      const parsed = parseRoleValue(agent, value);
      const ws = openWorkspace(opts);
      const conversation = pickConversation(ws, opts.conversation);
      const temps = ws.settings.setTemperature(conversation.id, parsed.role, parsed.value);
      ws.activity.append('temperatures_updated', `${parsed.role} set by hand for ${conversation.id}`,
        `${parsed.role}=${parsed.value.toFixed(2)}`);
      console.log(formatTemperatureLine(parsed.role, temps[parsed.role]));
    } catch (err) {
      console.error(chalk.red('Error:'), errorMessage(err));
      process.exit(1);
    }
  });
