import { describe, expect, it, vi } from 'vitest';
import { EngineLogger, createEngineLogger, formatLog, shouldLog } from '../EngineLogger.js';
import { LogLevel, type LogEntry, type LogSink } from '../../types/log-types.js';

function capture(): { lines: string[]; sink: LogSink } {
  const lines: string[] = [];
  return { lines, sink: (line) => lines.push(line) };
}

const entry: LogEntry = {
  timestamp: new Date('2024-05-01T10:00:00.000Z'),
  level: LogLevel.WARN,
  message: 'Skipping agent file',
  source: 'AgentGraph',
  category: 'discovery',
  context: { file: 'a.md' },
};

describe('shouldLog', () => {
  it('passes levels at or above the minimum', () => {
    expect(shouldLog(LogLevel.ERROR, LogLevel.WARN)).toBe(true);
    expect(shouldLog(LogLevel.WARN, LogLevel.WARN)).toBe(true);
    expect(shouldLog(LogLevel.INFO, LogLevel.WARN)).toBe(false);
  });
});

describe('formatLog', () => {
  it('renders a text line', () => {
    expect(formatLog(entry, { format: 'text', colors: false, timestamp: false })).toBe(
      '[WARN] AgentGraph: Skipping agent file {"file":"a.md"}'
    );
  });

  it('prefixes the timestamp when enabled', () => {
    expect(formatLog(entry, { format: 'text', colors: false, timestamp: true })).toBe(
      '2024-05-01T10:00:00.000Z [WARN] AgentGraph: Skipping agent file {"file":"a.md"}'
    );
  });

  it('renders one JSON object', () => {
    expect(JSON.parse(formatLog(entry, { format: 'json', colors: false, timestamp: false }))).toEqual({
      timestamp: '2024-05-01T10:00:00.000Z',
      level: 'warn',
      category: 'discovery',
      source: 'AgentGraph',
      message: 'Skipping agent file',
      context: { file: 'a.md' },
    });
  });
});

describe('EngineLogger', () => {
  it('filters by level and keeps a history of what passed', () => {
    const { lines, sink } = capture();
    const logger = new EngineLogger({ level: LogLevel.INFO, colors: false, sink });

    logger.debug('hidden');
    logger.info('Graph built', { agents: 3 });

    expect(lines).toEqual(['[INFO] AgentGraph: Graph built {"agents":3}']);
    expect(logger.getHistory().map((e) => e.message)).toEqual(['Graph built']);
  });

  it('appends the error name and message', () => {
    const { lines, sink } = capture();
    const logger = new EngineLogger({ level: LogLevel.DEBUG, colors: false, source: 'cli', sink });

    logger.error('Load failed', new TypeError('boom'));

    expect(lines).toEqual(['[ERROR] cli: Load failed (TypeError: boom)']);
  });

  it('changes level at runtime', () => {
    const { lines, sink } = capture();
    const logger = new EngineLogger({ level: LogLevel.ERROR, colors: false, sink });

    logger.warn('first');
    logger.setLevel(LogLevel.WARN);
    logger.warn('second');

    expect(lines).toEqual(['[WARN] AgentGraph: second']);
    expect(logger.willLog(LogLevel.INFO)).toBe(false);
  });

  it('clears its history', () => {
    const logger = new EngineLogger({ level: LogLevel.DEBUG, sink: () => undefined });

    logger.info('one');
    logger.clearHistory();

    expect(logger.getHistory()).toEqual([]);
  });

  it('drops the oldest entries past its history limit', () => {
    const logger = new EngineLogger({ level: LogLevel.DEBUG, sink: () => undefined, historyLimit: 2 });

    logger.info('one');
    logger.info('two');
    logger.info('three');

    expect(logger.getHistory().map((e) => e.message)).toEqual(['two', 'three']);
  });

  it('keeps no history when the limit is 0', () => {
    const { lines, sink } = capture();
    const logger = new EngineLogger({ level: LogLevel.DEBUG, colors: false, sink, historyLimit: 0 });

    logger.info('one');

    expect(lines).toEqual(['[INFO] AgentGraph: one']);
    expect(logger.getHistory()).toEqual([]);
  });

  it('sends warnings to stderr by default', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    try {
      const logger = new EngineLogger({ level: LogLevel.DEBUG, colors: false });
      logger.info('to stdout');
      logger.warn('to stderr');

      expect(log).toHaveBeenCalledWith('[INFO] AgentGraph: to stdout');
      expect(error).toHaveBeenCalledWith('[WARN] AgentGraph: to stderr');
    } finally {
      error.mockRestore();
      log.mockRestore();
    }
  });
});

describe('createEngineLogger', () => {
  it('returns null for silent', () => {
    expect(createEngineLogger('silent')).toBeNull();
  });

  it('maps the level name', () => {
    expect(createEngineLogger('warn')?.getConfig().level).toBe(LogLevel.WARN);
  });
});
