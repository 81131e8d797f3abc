/* -------------------- Formatting helpers -------------------- */
import type { ErrorEnvelope } from '../types/errors';
import chalk from 'chalk';

function elideMiddle(s: string, max = 96): string {
  if (s.length <= max) return s;
  const keep = Math.max(10, Math.floor((max - 1) / 2));
  return `${s.slice(0, keep)}…${s.slice(-keep)}`;
}

function shortJSON(v: unknown, max = 240): string {
  try {
    const s = JSON.stringify(v, (_k, val: unknown) =>
      typeof val === 'bigint' ? `${val.toString()}n` : val,
    );
    // JSON.stringify yields undefined for undefined, functions and symbols
    if (s === undefined) return String(v);
    return s.length > max ? elideMiddle(s, max) : s;
  } catch {
    return String(v);
  }
}

function kv(label: string, value: string): string {
  const width = 10;
  const pad = label.length >= width ? ' ' : ' '.repeat(width - label.length);
  return `${chalk.dim(label + pad)}: ${value}`;
}

function formatContextLine(ctx?: Record<string, unknown>): string | undefined {
  if (!ctx) return;
  const parts = Object.entries(ctx).map(([k, v]) => `${k}=${shortJSON(v, 120)}`);
  return parts.length ? `  ${kv('Context', parts.join('  •  '))}` : undefined;
}

function formatCause(c: unknown): string[] {
  if (!c || typeof c !== 'object') return c ? [`  ${kv('Cause', String(c))}`] : [];
  const out: string[] = [];
  const head: string[] = [];
  if ('name' in c && c.name) head.push(`name=${String(c.name)}`);
  if ('code' in c && c.code) head.push(`code=${String(c.code)}`);
  if (head.length) out.push(`  ${kv('Cause', head.join('  '))}`);

  if ('message' in c && c.message) {
    out.push(`              message=${elideMiddle(String(c.message), 600)}`);
  }
  return out;
}

export function formatEnvelopePretty(e: ErrorEnvelope): string {
  const lines: string[] = [];

  // Header
  lines.push(`${chalk.red('✖')} ${chalk.bold('ChainIdError')} [${chalk.yellow(e.type)}]`);
  lines.push(`  ${kv('Message', e.message)}`);
  lines.push('');

  lines.push(`  ${kv('Operation', e.operation)}`);
  lines.push(`  ${kv('Resource', e.resource)}`);

  const ctxLine = formatContextLine(e.context);
  const causeLines = formatCause(e.cause);
  if (ctxLine || causeLines.length) lines.push('');
  if (ctxLine) lines.push(ctxLine);
  lines.push(...causeLines);

  return lines.join('\n');
}
