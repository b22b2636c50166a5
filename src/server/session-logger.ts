/**
 * Session Logger - Structured logging for commentary sessions.
 *
 * Writes JSONL logs to logs/sessions/{sessionId}.jsonl: lifecycle, audio
 * feed loops and faults, prompt deliveries and scheduler transitions.
 */

import { existsSync, mkdirSync, appendFileSync, readFileSync } from 'fs';
import { join, dirname } from 'path';
import type { SessionEventLog, SessionLogEvent } from '../session/types';

/**
 * Full log entry with metadata.
 */
export interface SessionLogEntry {
  timestamp: string;
  sessionId: string;
  event: SessionLogEvent;
}

function defaultLogsDir(): string {
  return join(process.cwd(), 'logs', 'sessions');
}

/**
 * Logger for a single commentary session.
 */
export class SessionLogger implements SessionEventLog {
  private sessionId: string;
  private logPath: string;
  private enabled: boolean;

  constructor(sessionId: string, logsDir?: string) {
    this.sessionId = sessionId;
    const baseDir = logsDir || defaultLogsDir();
    this.logPath = join(baseDir, `${sessionId}.jsonl`);
    this.enabled = true;

    const dir = dirname(this.logPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  /**
   * Appends an event to the session log file.
   */
  log(event: SessionLogEvent): void {
    if (!this.enabled) return;

    const entry: SessionLogEntry = {
      timestamp: new Date().toISOString(),
      sessionId: this.sessionId,
      event,
    };

    try {
      appendFileSync(this.logPath, JSON.stringify(entry) + '\n');
    } catch (error) {
      console.error(`[SessionLogger] Failed to write log: ${error}`);
    }
  }

  warning(message: string, context?: string): void {
    this.log({ type: 'warning', message, context });
  }

  debug(message: string, data?: unknown): void {
    this.log({ type: 'debug', message, data });
  }

  getLogPath(): string {
    return this.logPath;
  }

  /**
   * Disables logging (for tests).
   */
  disable(): void {
    this.enabled = false;
  }

  enable(): void {
    this.enabled = true;
  }
}

/**
 * Reads all log entries for a session. Unparseable lines are skipped.
 */
export function readSessionLogs(sessionId: string, logsDir?: string): SessionLogEntry[] {
  const logPath = join(logsDir || defaultLogsDir(), `${sessionId}.jsonl`);

  if (!existsSync(logPath)) {
    return [];
  }

  const content = readFileSync(logPath, 'utf-8');
  const lines = content.trim().split('\n').filter(line => line.length > 0);

  const entries: SessionLogEntry[] = [];
  for (const line of lines) {
    try {
      entries.push(JSON.parse(line));
    } catch {
      console.warn(`[SessionLogger] Skipping malformed line in ${logPath}`);
    }
  }
  return entries;
}

/**
 * Filters log entries by event type.
 */
export function filterLogsByType(logs: SessionLogEntry[], types: SessionLogEvent['type'][]): SessionLogEntry[] {
  return logs.filter(entry => types.includes(entry.event.type));
}

/**
 * Generates a unique session ID.
 */
export function generateSessionId(): string {
  return `session_${Date.now()}_${Math.random().toString(36).substring(2, 9)}`;
}
