import { Command } from 'commander';
import chalk from 'chalk';
import {
  AGENT_ROLES,
  TEMPERATURE_PRESETS,
  createBlender,
  findPreset,
  formatTemperatureLine,
  type EmotionMeasurement,
} from '@mindloop/core';
import { errorMessage, openWorkspace, pickConversation } from '../context.js';

/** `Joy=60 Focus=40` → measurements. */
export function parseBlendArgs(pairs: readonly string[]): EmotionMeasurement[] {
  return pairs.map((pair) => {
    const eq = pair.lastIndexOf('=');
    const label = eq === -1 ? '' : pair.slice(0, eq).trim();
    const raw = eq === -1 ? '' : pair.slice(eq + 1).trim().replace(/%$/, '');
    const percentage = Number(raw);
    if (!label || raw === '' || !Number.isFinite(percentage)) {
      throw new Error(`Expected label=percent, got "${pair}"`);
    }
    return { label, percentage };
  });
}

/** Either explicit pairs or a named preset, never both. */
export function blendInput(pairs: readonly string[], preset?: string): EmotionMeasurement[] {
  if (preset === undefined) {
    if (pairs.length === 0) throw new Error('Give label=percent pairs or --preset <name>');
    return parseBlendArgs(pairs);
  }
  if (pairs.length > 0) throw new Error('Give either label=percent pairs or --preset, not both');
  const found = findPreset(preset);
  if (!found) {
    const names = TEMPERATURE_PRESETS.map((p) => `"${p.name}"`).join(', ');
    throw new Error(`Unknown preset "${preset}". Presets: ${names}`);
  }
  return found.emotions;
}

interface BlendOptions {
  associative?: boolean;
  preset?: string;
  apply?: boolean;
  conversation?: string;
  root?: string;
}

export const blendCommand = new Command('blend')
  .description('Compute temperatures for a weighted emotional state, offline; --apply stores them on a conversation')
  .argument('[pairs...]', 'label=percent pairs, e.g. Joy=60 Focus=40')
  .option('-p, --preset <name>', 'Use a named preset instead of pairs')
  .option('-a, --associative', 'Use the associative DayDream rule')
  .option('--apply', 'Make the result the conversation\'s current temperatures')
  .option('-c, --conversation <id>', 'Conversation for --apply (default: most recent)')
  .option('-r, --root <path>', 'Data root (default: MINDLOOP_ROOT or current directory)')
  .action((pairs: string[], opts: BlendOptions) => {
    try {
      const measurements = blendInput(pairs, opts.preset);
      const blender = createBlender({ dayDreamRule: opts.associative ? 'associative' : 'table' });

      let temps = blender(measurements);
      if (opts.apply) {
        const ws = openWorkspace(opts);
        const conversation = pickConversation(ws, opts.conversation);
        temps = ws.settings.applyBlend(conversation.id, measurements, blender);
        ws.activity.append('temperatures_updated', `Temperatures set by hand for ${conversation.id}`,
          measurements.map((m) => `${m.percentage}% ${m.label}`).join(', '));
        console.log(chalk.green('Applied to'), conversation.id);
      }

      console.log();
      for (const role of AGENT_ROLES) {
        console.log(formatTemperatureLine(role, temps[role]).replace(/^/gm, '  '));
      }
      console.log();
    } catch (err) {
      console.error(chalk.red('Error:'), errorMessage(err));
      process.exit(1);
    }
  });
