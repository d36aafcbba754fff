import type { Group } from '../model/groups.js';

export type TransportMode = 'stopped' | 'playing';

/** Pattern and step pointer a group remembers while another group is selected. */
export interface GroupCursor {
  patternIndex: number;
  stepIndex: number;
  /** Step played by the most recent tick since entering PLAYING, if any. */
  lastTickedStep: number | null;
}

export interface TransportSnapshot {
  mode: TransportMode;
  recording: boolean;
  group: Group;
  patternIndex: number;
  currentStepIndex: number;
  tempoBpm: number;
  stepsPerPattern: number;
}

export interface StepAdvancedEvent {
  currentStepIndex: number;
  group: Group;
  patternIndex: number;
  transportMode: TransportMode;
  recording: boolean;
}
