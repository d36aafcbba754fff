// Programmatic entry point for embedding the CLI pieces in other tools.
export { createProgram, summarizePatterns, openPatternBank, DEFAULT_PATTERNS_FILE } from './program.js';
export {
  loadConfig,
  loadDefaultConfig,
  validateConfig,
  mergeConfig,
  writeExampleConfig,
  CONFIG_FILE_NAME,
  type StepDeckConfig,
  type AudioConfig,
  type SampleMap,
  type UIConfig,
  type LoadedConfig,
} from './config.js';
export { KeyMap, controlsLegend, keyIdFromKeypress, keyBindingConflicts, isKeyId, type KeyBindings, type KeyAction } from './keymap.js';
export { SystemAudioSink, playerCommand, type Spawner, type PlayerProcess } from './nodeAudioPlayer.js';
export { loadSampleBank, sampleName, type SampleLoadReport } from './sampleLoader.js';
export { renderFrame, TerminalView, type FrameInput } from './terminalView.js';
export { LiveController, runLiveSession } from './liveSession.js';
