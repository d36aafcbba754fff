import { createLogger } from './logger.js';

const log = createLogger('diagnostics');

export type DiagLevel = 'WARN' | 'ERROR' | 'INFO';

export interface DiagMeta {
  file?: string;
  group?: string;
  pad?: number;
  pattern?: number;
}

export function formatDiagnostic(level: DiagLevel, component: string, message: string, meta?: DiagMeta): string {
  const parts: string[] = [];
  parts.push(`[${level}]`);
  parts.push(`[${component || 'unknown'}]`);
  parts.push(message);
  const fields: string[] = [];
  if (meta) {
    if (meta.file) fields.push(`file=${meta.file}`);
    if (meta.group) fields.push(`group=${meta.group}`);
    if (typeof meta.pattern === 'number') fields.push(`pattern=${meta.pattern}`);
    if (typeof meta.pad === 'number') fields.push(`pad=${meta.pad}`);
  }
  if (fields.length) parts.push(fields.join(', '));
  return parts.join(' ');
}

export function info(component: string, message: string, meta?: DiagMeta): void {
  log.info(formatDiagnostic('INFO', component, message, meta));
}

export function warn(component: string, message: string, meta?: DiagMeta): void {
  log.warn(formatDiagnostic('WARN', component, message, meta));
}

export function error(component: string, message: string, meta?: DiagMeta): void {
  log.error(formatDiagnostic('ERROR', component, message, meta));
}

export default { formatDiagnostic, info, warn, error };
