import { randomUUID } from 'node:crypto';

export function generateId(prefix?: string): string {
  const short = randomUUID().replace(/-/g, '').slice(0, 8);
  return prefix ? `${prefix}_${short}` : short;
}

export function now(): string {
  return new Date().toISOString();
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Replace `{name}` placeholders. Unknown placeholders are left as-is. */
export function fillTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(vars, key) ? vars[key] : match,
  );
}
