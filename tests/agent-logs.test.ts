import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { agentLog, clearAgentLogs, getAgentLogs } from '@founder-finder/agents';

beforeEach(() => {
  clearAgentLogs();
});

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

describe('agent log buffer', () => {
  it('stores entries with defaults and returns entries after an id', () => {
    const first = agentLog('Test', 'one');
    agentLog('Test', 'two', { level: 'warn', detail: 'more' });

    expect(first.level).toBe('info');
    const after = getAgentLogs(first.id);
    expect(after).toHaveLength(1);
    expect(after[0]).toMatchObject({ agent: 'Test', level: 'warn', message: 'two', detail: 'more' });
    expect(getAgentLogs('unknown-id')).toHaveLength(2);
  });

  it('keeps at most 500 entries', () => {
    for (let i = 0; i < 510; i++) agentLog('Test', `m${i}`);
    const logs = getAgentLogs();
    expect(logs).toHaveLength(500);
    expect(logs[0]?.message).toBe('m10');
  });

  it('echoes to the console with agent and level prefix', () => {
    vi.stubEnv('LOG_LEVEL', '');
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    agentLog('Search', 'slow response', { level: 'warn' });
    agentLog('Search', 'hidden', { level: 'debug' });

    expect(warn).toHaveBeenCalledWith('[Search] [WARN] slow response');
    expect(log).not.toHaveBeenCalled();
  });

  it('prints debug lines only in debug mode', () => {
    vi.stubEnv('LOG_LEVEL', 'debug');
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    agentLog('Search', 'details', { level: 'debug', detail: '{"n":1}' });

    expect(log).toHaveBeenCalledWith('[Search] [DEBUG] details', '{"n":1}');
  });
});
