import fs from 'fs';
import path from 'path';
import { getRuntimeConfig, LogLevel } from '../config/runtimeConfig';

export interface LogRecord {
  ts: string; // ISO timestamp
  level: LogLevel;
  evt: string; // short event key, e.g. catalog:saved
  msg?: string;
  ms?: number;
  data?: unknown;
}

const LEVEL_RANK: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

let logFileHandle: fs.WriteStream | null = null;
let logFilePath: string | undefined;

function loggingCfg(){
  return getRuntimeConfig().logging;
}

// Lazily opened on first emit; reopened when the configured path changes (tests reload config).
function ensureFileLogging(file: string): void {
  if(logFileHandle && logFilePath === file) return;
  if(logFileHandle && !logFileHandle.destroyed) logFileHandle.end();
  logFileHandle = null;
  try {
    const logDir = path.dirname(file);
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
    logFileHandle = fs.createWriteStream(file, { flags: 'a', encoding: 'utf8' });
    logFilePath = file;
  } catch (error) {
    // Fallback to stderr only if file logging fails
    console.error(`[logger] Failed to initialize file logging to ${file}: ${error}`);
  }
}

function format(rec: LogRecord, json: boolean): string {
  if(json) return JSON.stringify(rec);
  const parts = [rec.ts, rec.level.toUpperCase(), rec.evt, rec.msg||''];
  if(rec.ms !== undefined) parts.push(`${rec.ms}ms`);
  if(rec.data !== undefined) parts.push(JSON.stringify(rec.data));
  return parts.filter(Boolean).join(' ');
}

function emit(rec: LogRecord){
  const cfg = loggingCfg();
  if(LEVEL_RANK[rec.level] > LEVEL_RANK[cfg.level]) return;
  const logLine = format(rec, cfg.json);

  console.error(logLine);

  if (cfg.file) {
    ensureFileLogging(cfg.file);
    if (logFileHandle && !logFileHandle.destroyed) {
      try { logFileHandle.write(logLine + '\n'); } catch (error) { console.error(`[logger] file write failed: ${error}`); }
    }
  }
}

export function log(level: LogLevel, evt: string, fields: Omit<LogRecord,'level'|'evt'|'ts'> = {}){
  emit({ ts: new Date().toISOString(), level, evt, ...fields });
}

export const logDebug = (evt:string, f?:unknown)=> log('debug', evt, { data:f });
export const logInfo = (evt:string, f?:unknown)=> log('info', evt, { data:f });
export const logWarn = (evt:string, f?:unknown)=> log('warn', evt, { data:f });
export const logError = (evt:string, f?:unknown)=> log('error', evt, { data:f });
