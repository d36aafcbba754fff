/**
 * Terminal rendering of the session: transport line, group tabs, the pad x step
 * grid of the active pattern, the 4x4 pad grid, the mixer and a key legend.
 * renderFrame is pure; TerminalView owns the output stream.
 */

import { clearScreenDown, cursorTo } from 'readline';
import { GROUPS, MAX_PATTERNS, PADS_PER_GROUP, type MixerSnapshot, type PatternView, type TransportSnapshot } from '@stepdeck/engine';

export interface FrameInput {
  transport: TransportSnapshot;
  mixer: MixerSnapshot;
  /** Active pattern of the selected group. */
  pattern: PatternView;
  padNames: string[];
  padKeys: string[];
  /** Pads currently lit after a trigger. */
  flashing: ReadonlySet<number>;
  /** Controls line under the mixer. */
  legend: string;
  message?: string;
}

const PAD_COLUMNS = 4;
const NAME_WIDTH = 8;

function percent(gain: number): string {
  return `${Math.round(gain * 100)}%`;
}

// Grid cells: hit / empty, and the same under the step pointer
const HIT = '#';
const REST = '.';
const HIT_NOW = '@';
const REST_NOW = ':';
const GRID_LABEL_WIDTH = 12;

function stepCells(length: number, cell: (step: number) => string): string {
  const cells: string[] = [];
  for (let step = 0; step < length; step++) {
    if (step > 0 && step % 4 === 0) cells.push('|');
    cells.push(cell(step));
  }
  return cells.join('');
}

/** Step ruler followed by one row per pad, grid[pad][step]. */
function patternGrid(input: FrameInput): string[] {
  const { pattern } = input;
  const current = input.transport.currentStepIndex;
  const lines = ['Step'.padEnd(GRID_LABEL_WIDTH) + stepCells(pattern.length, step => (step === current ? 'v' : '-'))];
  pattern.toGrid().forEach((row, pad) => {
    const label = `${String(pad + 1).padStart(2)} ${(input.padNames[pad] ?? '').slice(0, NAME_WIDTH).padEnd(NAME_WIDTH)} `;
    const cells = stepCells(pattern.length, step => {
      if (step === current) return row[step] ? HIT_NOW : REST_NOW;
      return row[step] ? HIT : REST;
    });
    lines.push(label + cells);
  });
  return lines;
}

function padCell(input: FrameInput, pad: number): string {
  const lit = input.flashing.has(pad) ? '*' : ' ';
  const key = (input.padKeys[pad] ?? '').padEnd(1);
  const name = (input.padNames[pad] ?? '').slice(0, NAME_WIDTH).padEnd(NAME_WIDTH);
  return `${lit}[${key}] ${name}`;
}

export function renderFrame(input: FrameInput): string[] {
  const { transport, mixer } = input;
  const lines: string[] = [];

  const mode = transport.mode === 'playing' ? 'PLAYING' : 'STOPPED';
  lines.push(`StepDeck  ${mode}${transport.recording ? '  REC' : ''}  ${transport.tempoBpm} BPM`);

  const tabs = GROUPS.map(g => (g === transport.group ? `[${g}]` : ` ${g} `)).join(' ');
  const patternNo = String(transport.patternIndex + 1).padStart(2, '0');
  lines.push(`${tabs}  Pattern ${patternNo}/${MAX_PATTERNS}`);
  lines.push(...patternGrid(input));
  lines.push('');

  for (let row = 0; row < PADS_PER_GROUP / PAD_COLUMNS; row++) {
    const cells: string[] = [];
    for (let col = 0; col < PAD_COLUMNS; col++) cells.push(padCell(input, row * PAD_COLUMNS + col));
    lines.push(cells.join(' ').trimEnd());
  }
  lines.push('');

  const master = `Master ${percent(mixer.master.gain)}${mixer.master.muted ? ' (muted)' : ''}`;
  const groups = GROUPS.map(g => {
    const ch = mixer.groups[g];
    return `${g} ${percent(ch.gain)}${ch.muted ? ' M' : ''}`;
  });
  lines.push([master, ...groups].join('  '));
  lines.push(input.legend);
  if (input.message) lines.push(input.message);
  return lines;
}

export class TerminalView {
  constructor(private out: NodeJS.WritableStream = process.stdout) {}

  draw(input: FrameInput): void {
    cursorTo(this.out, 0, 0);
    clearScreenDown(this.out);
    this.out.write(renderFrame(input).join('\n') + '\n');
  }

  hideCursor(): void {
    this.out.write('\x1b[?25l');
  }

  showCursor(): void {
    this.out.write('\x1b[?25h');
  }
}

export default TerminalView;
