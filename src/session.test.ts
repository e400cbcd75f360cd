/**
 * Session Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ConfigurationError, PtyIoError, SpawnError } from './errors.js';
import { PtySession, compilePromptPatterns, validateWindowSize } from './session.js';
import { FakeBackend, fakeBackendFactory } from './testing.js';
import type { Frame, SessionOptions } from './types.js';

const baseOptions: SessionOptions = {
  command: 'bash',
  args: ['-l'],
  cols: 120,
  rows: 40,
  idleTimeoutMs: 200,
  pollIntervalMs: 100,
};

async function drain(session: PtySession): Promise<Frame[]> {
  const frames: Frame[] = [];
  for await (const f of session) frames.push(f);
  return frames;
}

describe('validateWindowSize', () => {
  it('should accept 1x1 and 65535x65535', () => {
    expect(() => validateWindowSize(1, 1)).not.toThrow();
    expect(() => validateWindowSize(65535, 65535)).not.toThrow();
  });

  it('should reject a zero dimension', () => {
    expect(() => validateWindowSize(0, 40)).toThrow(ConfigurationError);
    expect(() => validateWindowSize(80, 0)).toThrow('Window size must be at least 1x1, got 80x0');
  });

  it('should reject fractional sizes', () => {
    expect(() => validateWindowSize(80.5, 24)).toThrow(ConfigurationError);
  });
});

describe('compilePromptPatterns', () => {
  it('should compile every pattern', () => {
    const patterns = compilePromptPatterns(['\\$ $', '>>> ']);
    expect(patterns.map(p => p.source)).toEqual(['\\$ $', '>>> ']);
  });

  it('should name the pattern that fails', () => {
    expect(() => compilePromptPatterns(['ok', '('])).toThrow(/^Invalid prompt regex '\('/);
  });
});

describe('PtySession', () => {
  let backend: FakeBackend;
  let session: PtySession;

  beforeEach(async () => {
    vi.useFakeTimers();
    const fake = fakeBackendFactory();
    backend = fake.backend;
    session = await PtySession.spawn(baseOptions, fake.factory);
  });

  afterEach(() => {
    session.cancel();
    vi.useRealTimers();
  });

  describe('spawn', () => {
    it('should pass the launch spec to the backend', async () => {
      const fake = fakeBackendFactory();
      const other = await PtySession.spawn(
        { ...baseOptions, cwd: '/tmp', env: { APP_MODE: 'test' } },
        fake.factory
      );

      expect(fake.launched).toHaveLength(1);
      const [spec] = fake.launched;
      expect(spec.command).toBe('bash');
      expect(spec.args).toEqual(['-l']);
      expect(spec.cols).toBe(120);
      expect(spec.rows).toBe(40);
      expect(spec.cwd).toBe('/tmp');
      expect(spec.env.APP_MODE).toBe('test');
      expect(other.pid).toBe(fake.backend.pid);

      other.cancel();
    });

    it('should advertise the terminal type from TERM', async () => {
      vi.stubEnv('TERM', 'screen-256color');
      const fake = fakeBackendFactory();

      try {
        const other = await PtySession.spawn(baseOptions, fake.factory);
        other.cancel();
      } finally {
        vi.unstubAllEnvs();
      }

      expect(fake.launched[0].term).toBe('screen-256color');
    });

    it('should let an explicit TERM override the inherited one', async () => {
      const fake = fakeBackendFactory();

      const other = await PtySession.spawn({ ...baseOptions, env: { TERM: 'vt220' } }, fake.factory);
      other.cancel();

      expect(fake.launched[0].term).toBe('vt220');
    });

    it('should reject invalid options before spawning', async () => {
      const fake = fakeBackendFactory();

      await expect(PtySession.spawn({ ...baseOptions, cols: 0 }, fake.factory))
        .rejects.toThrow(ConfigurationError);
      await expect(PtySession.spawn({ ...baseOptions, idleTimeoutMs: 0 }, fake.factory))
        .rejects.toThrow('Idle timeout must be greater than 0, got 0');
      await expect(PtySession.spawn({ ...baseOptions, maxBufferBytes: 0 }, fake.factory))
        .rejects.toThrow(ConfigurationError);
      await expect(PtySession.spawn({ ...baseOptions, promptPatterns: ['['] }, fake.factory))
        .rejects.toThrow(ConfigurationError);

      expect(fake.launched).toHaveLength(0);
    });

    it('should propagate spawn failures', async () => {
      const failing = () => {
        throw new SpawnError('Failed to spawn nope: ENOENT');
      };

      await expect(PtySession.spawn(baseOptions, failing)).rejects.toThrow(SpawnError);
    });
  });

  describe('output', () => {
    it('should emit one stdout frame per chunk', async () => {
      backend.emit('hello ');
      backend.emit('world\r\n');

      const first = await session.nextFrame();
      const second = await session.nextFrame();

      expect(first.value).toMatchObject({ type: 'stdout', data: 'hello ' });
      expect(second.value).toMatchObject({ type: 'stdout', data: 'world\r\n' });
    });

    it('should count unconsumed payload bytes', () => {
      backend.emit('abc');
      backend.emit('é');

      expect(session.pendingBytes).toBe(5);
    });

    it('should emit eof when output ends', () => {
      const onEof = vi.fn();
      session.on('eof', onEof);

      backend.end();

      expect(onEof).toHaveBeenCalledTimes(1);
    });
  });

  describe('idle detection', () => {
    it('should emit idle once the threshold passes without output', async () => {
      vi.advanceTimersByTime(200);

      const { value } = await session.nextFrame();
      expect(value).toMatchObject({ type: 'idle', dur_ms: 200 });
    });

    it('should emit a single idle frame per quiet period', async () => {
      vi.advanceTimersByTime(1000);
      backend.exit(0);
      vi.advanceTimersByTime(100);

      const frames = await drain(session);
      expect(frames.map(f => f.type)).toEqual(['idle', 'exit']);
    });

    it('should re-arm after activity', async () => {
      vi.advanceTimersByTime(250);
      backend.emit('x');
      vi.advanceTimersByTime(150);
      backend.emit('y');
      vi.advanceTimersByTime(200);
      backend.exit(0);
      vi.advanceTimersByTime(100);

      const frames = await drain(session);
      expect(frames.map(f => f.type)).toEqual(['idle', 'stdout', 'stdout', 'idle', 'exit']);
      expect(frames[3].dur_ms).toBe(200);
    });

    it('should count input as activity', async () => {
      vi.advanceTimersByTime(150);
      session.writeInput('q');
      vi.advanceTimersByTime(150);
      backend.exit(0);
      vi.advanceTimersByTime(100);

      const frames = await drain(session);
      expect(frames.map(f => f.type)).toEqual(['stdin', 'idle', 'exit']);
      expect(frames[1].dur_ms).toBe(200);
    });
  });

  describe('input', () => {
    it('should write to the child and echo a stdin frame', async () => {
      session.writeInput('ls\n');

      expect(backend.writes).toEqual(['ls\n']);
      const { value } = await session.nextFrame();
      expect(value).toMatchObject({ type: 'stdin', data: 'ls\n' });
    });

    it('should pass byte input through unchanged', async () => {
      session.writeInput(new Uint8Array([0xff, 0x41]));

      expect(backend.writes).toEqual([Buffer.from([0xff, 0x41])]);
      const { value } = await session.nextFrame();
      expect(value).toMatchObject({ type: 'stdin', data: '\uFFFDA' });
    });

    it('should raise PtyIoError when the write fails', () => {
      backend.failWrites = true;

      expect(() => session.writeInput('x')).toThrow(PtyIoError);
    });

    it('should raise PtyIoError after the child exited', () => {
      backend.exit(0);

      expect(() => session.writeInput('x')).toThrow('Cannot write: child process has exited');
      expect(backend.writes).toEqual([]);
    });
  });

  describe('resize', () => {
    it('should resize the PTY and emit a resize frame', async () => {
      session.resize(200, 50);

      expect(backend.resizes).toEqual([[200, 50]]);
      expect(session.cols).toBe(200);
      expect(session.rows).toBe(50);
      const { value } = await session.nextFrame();
      expect(value).toMatchObject({ type: 'resize', cols: 200, rows: 50 });
    });

    it('should reject a zero dimension without touching the PTY', () => {
      expect(() => session.resize(0, 50)).toThrow(ConfigurationError);
      expect(backend.resizes).toEqual([]);
      expect(session.cols).toBe(120);
    });

    it('should raise PtyIoError when the PTY rejects the size', () => {
      backend.failResizes = true;

      expect(() => session.resize(100, 30)).toThrow(PtyIoError);
      expect(session.cols).toBe(120);
    });

    it('should emit resize_ack', async () => {
      session.acknowledgeResize(200, 50);

      const { value } = await session.nextFrame();
      expect(value).toMatchObject({ type: 'resize_ack', cols: 200, rows: 50 });
    });
  });

  describe('exit', () => {
    it('should emit the exit code and close the stream', async () => {
      const onExit = vi.fn();
      session.on('exit', onExit);

      backend.emit('bye\n');
      backend.exit(3);
      vi.advanceTimersByTime(100);

      const frames = await drain(session);
      expect(frames.map(f => f.type)).toEqual(['stdout', 'exit']);
      expect(frames[1].code).toBe(3);
      expect(onExit).toHaveBeenCalledWith({ code: 3 });
      expect(session.isAlive()).toBe(false);
    });

    it('should emit a signal frame when killed by a signal', async () => {
      backend.exit(-1, 'SIGTERM');
      vi.advanceTimersByTime(100);

      const frames = await drain(session);
      expect(frames).toHaveLength(1);
      expect(frames[0].type).toBe('signal');
      expect(frames[0].signal).toBe('SIGTERM');
      expect(frames[0].code).toBeUndefined();
    });

    it('should resolve done after the exit frame', async () => {
      backend.exit(0);
      vi.advanceTimersByTime(100);

      await expect(session.done).resolves.toBeUndefined();
    });

    it('should stop emitting idle after exit', async () => {
      backend.exit(0);
      vi.advanceTimersByTime(1000);

      const frames = await drain(session);
      expect(frames.map(f => f.type)).toEqual(['exit']);
    });
  });

  describe('cancel', () => {
    it('should kill a live child and end the stream', async () => {
      backend.emit('partial');
      session.cancel();

      expect(backend.kills).toEqual(['SIGKILL']);
      const frames = await drain(session);
      expect(frames.map(f => f.type)).toEqual(['stdout']);
    });

    it('should not kill a child that already exited', () => {
      backend.exit(0);
      session.cancel();

      expect(backend.kills).toEqual([]);
    });
  });

  describe('back-pressure', () => {
    let limited: PtySession;
    let limitedBackend: FakeBackend;

    beforeEach(async () => {
      const fake = fakeBackendFactory();
      limitedBackend = fake.backend;
      limited = await PtySession.spawn(
        { ...baseOptions, maxBufferBytes: 10, overflowGraceMs: 300 },
        fake.factory
      );
    });

    afterEach(() => {
      limited.cancel();
    });

    it('should warn, then kill the child when the backlog is not drained', async () => {
      limitedBackend.emit('x'.repeat(20));
      vi.advanceTimersByTime(500);

      const frames = await drain(limited);
      expect(frames.map(f => f.type)).toEqual(['stdout', 'overflow', 'idle', 'capsule_kill', 'signal']);
      expect(frames[1].reason).toBe('20 bytes pending exceeds buffer budget of 10 bytes');
      expect(frames[3].reason).toBe('backlog of 20 bytes not drained within 300ms grace period');
      expect(frames[4].signal).toBe('SIGKILL');
      expect(limitedBackend.kills).toEqual(['SIGKILL']);
    });

    it('should stand down once the consumer catches up', async () => {
      limitedBackend.emit('x'.repeat(20));
      vi.advanceTimersByTime(100);

      await limited.nextFrame();
      await limited.nextFrame();
      expect(limited.pendingBytes).toBe(0);

      vi.advanceTimersByTime(1000);
      expect(limitedBackend.kills).toEqual([]);
      expect(limited.isAlive()).toBe(true);
    });

    it('should count bytes held downstream against the budget', async () => {
      let downstream = 0;
      limited.watchBacklog(() => downstream);

      const first = limited.nextFrame();
      limitedBackend.emit('z'.repeat(8));
      await first;
      downstream = 25;
      vi.advanceTimersByTime(500);

      const frames = await drain(limited);
      expect(frames.map(f => f.type)).toEqual(['overflow', 'idle', 'capsule_kill', 'signal']);
      expect(frames[0].reason).toBe('25 bytes pending exceeds buffer budget of 10 bytes');
      expect(limitedBackend.kills).toEqual(['SIGKILL']);
    });

    it('should not count frames handed straight to a waiting reader', async () => {
      const next = limited.nextFrame();
      limitedBackend.emit('y'.repeat(50));

      expect(limited.pendingBytes).toBe(0);
      const { value } = await next;
      expect(value?.data).toBe('y'.repeat(50));
    });
  });
});
