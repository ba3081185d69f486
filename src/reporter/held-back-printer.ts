/**
 * Plain-text report of a HoldMap:
 *
 *   Holder----=>[Dep@2.0.0 {1}, Other@0.4.1 {0.3}]
 *   LongHolder=>[Dep@2.0.0 {1.5-1}]
 */

import pc from 'picocolors';
import { compareNames } from '../checker/held-back-by.js';
import { formatHeldBack, type HeldBack, type HoldMap } from '../checker/held-back.js';

export interface TextOutput {
  write(chunk: string): unknown;
}

export interface PrintOptions {
  /** ANSI colors for versions and bounds */
  color?: boolean;
}

const colors = pc.createColors(true);

function formatColored(heldBack: HeldBack): string {
  return `${heldBack.name}@${colors.green(heldBack.lastVersion.version)} ${colors.red(heldBack.compat.toString())}`;
}

export function formatHoldMap(holdMap: HoldMap, options: PrintOptions = {}): string[] {
  const holders = [...holdMap.keys()].sort(compareNames);
  // Width in UTF-16 code units; exact for ASCII package names
  const pad = Math.max(0, ...holders.map((holder) => holder.length));
  const render = options.color ? formatColored : formatHeldBack;

  return holders.map((holder) => {
    const heldBack = holdMap.get(holder) ?? [];
    return `${holder.padEnd(pad, '-')}=>[${heldBack.map(render).join(', ')}]`;
  });
}

export function printHoldMap(output: TextOutput, holdMap: HoldMap, options: PrintOptions = {}): void {
  for (const line of formatHoldMap(holdMap, options)) {
    output.write(`${line}\n`);
  }
}
