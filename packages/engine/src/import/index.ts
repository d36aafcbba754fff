/**
 * Import module exports
 */

export { parsePatternBank, patternStoreFromDocument, loadPatternsJSON } from './jsonImport.js';
