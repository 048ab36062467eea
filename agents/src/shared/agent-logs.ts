/**
 * In-memory agent log buffer, echoed to the console.
 * LOG_LEVEL=debug shows debug lines; LOG_LEVEL=silent keeps the console quiet.
 */

import type { LogLevel } from './types.js';

export interface AgentLogEntry {
  id: string;
  ts: number;
  agent: string;
  level: LogLevel;
  message: string;
  detail?: string;
}

const MAX_LOGS = 500;
const logs: AgentLogEntry[] = [];
let nextId = 1;

function echo(entry: AgentLogEntry): void {
  const mode = process.env.LOG_LEVEL;
  if (mode === 'silent') return;
  if (entry.level === 'debug' && mode !== 'debug') return;

  const line = `[${entry.agent}] [${entry.level.toUpperCase()}] ${entry.message}`;
  const args = entry.detail ? [line, entry.detail] : [line];
  if (entry.level === 'error') console.error(...args);
  else if (entry.level === 'warn') console.warn(...args);
  else console.log(...args);
}

export function agentLog(
  agent: string,
  message: string,
  options?: { level?: LogLevel; detail?: string },
): AgentLogEntry {
  const entry: AgentLogEntry = {
    id: `log-${nextId++}`,
    ts: Date.now(),
    agent,
    level: options?.level ?? 'info',
    message,
    detail: options?.detail,
  };
  logs.push(entry);
  if (logs.length > MAX_LOGS) logs.shift();
  echo(entry);
  return entry;
}

export function getAgentLogs(afterId?: string): AgentLogEntry[] {
  if (!afterId) return [...logs];
  const idx = logs.findIndex((l) => l.id === afterId);
  if (idx < 0) return [...logs];
  return logs.slice(idx + 1);
}

export function clearAgentLogs(): void {
  logs.length = 0;
}
