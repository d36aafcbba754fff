/**
 * Index lookup table from (group, pad) to a loaded sample handle.
 *
 * The bank references handles produced by whoever loads samples; it never
 * decodes audio itself.
 */

import padNames from './padNames.json';
import { GROUPS, PADS_PER_GROUP, groupIndex, isPadIndex, type Group } from '../model/groups.js';

export interface SampleHandle {
  /** Display name shown on the pad. */
  name: string;
  /** Location the sink plays from. */
  path: string;
}

export interface SampleResolver<H = SampleHandle> {
  resolve(group: Group, pad: number): H | undefined;
}

interface Slot<H> {
  handle: H;
  name: string;
}

export function defaultPadName(group: Group, pad: number): string {
  const names: string[] = padNames[group];
  return names[pad] ?? `${group}${pad + 1}`;
}

export class SampleBank<H = SampleHandle> implements SampleResolver<H> {
  private slots = new Array<Slot<H> | undefined>(GROUPS.length * PADS_PER_GROUP);

  private slotIndex(group: Group, pad: number): number {
    if (!isPadIndex(pad)) throw new RangeError(`Pad ${pad} is outside 0..${PADS_PER_GROUP - 1}`);
    return groupIndex(group) * PADS_PER_GROUP + pad;
  }

  assign(group: Group, pad: number, handle: H, name: string): void {
    this.slots[this.slotIndex(group, pad)] = { handle, name };
  }

  remove(group: Group, pad: number): void {
    this.slots[this.slotIndex(group, pad)] = undefined;
  }

  resolve(group: Group, pad: number): H | undefined {
    if (!isPadIndex(pad)) return undefined;
    return this.slots[this.slotIndex(group, pad)]?.handle;
  }

  has(group: Group, pad: number): boolean {
    return this.resolve(group, pad) !== undefined;
  }

  /** Name of the loaded sample, or the default label for the pad. */
  nameOf(group: Group, pad: number): string {
    return this.slots[this.slotIndex(group, pad)]?.name ?? defaultPadName(group, pad);
  }

  loadedCount(group?: Group): number {
    const groups = group ? [group] : GROUPS;
    let n = 0;
    for (const g of groups) {
      for (let pad = 0; pad < PADS_PER_GROUP; pad++) {
        if (this.slots[this.slotIndex(g, pad)]) n++;
      }
    }
    return n;
  }
}

export default SampleBank;
