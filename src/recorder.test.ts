/**
 * Recorder Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { RecordingError } from './errors.js';
import { FrameBuilder, frame } from './frame.js';
import { AsciicastRecorder, RecordingManager, toAsciicastEvent } from './recorder.js';

function readCast(file: string): unknown[] {
  return fs
    .readFileSync(file, 'utf8')
    .trim()
    .split('\n')
    .map(line => JSON.parse(line));
}

/** Clock that returns the given readings in order, then repeats the last */
function scriptedClock(...readings: number[]): () => number {
  let i = 0;
  return () => readings[Math.min(i++, readings.length - 1)];
}

describe('toAsciicastEvent', () => {
  it('should map output and input frames', () => {
    expect(toAsciicastEvent(frame('stdout').withData('out').build())).toEqual(['o', 'out']);
    expect(toAsciicastEvent(frame('stderr').withData('err').build())).toEqual(['o', 'err']);
    expect(toAsciicastEvent(frame('stdin').withData('in').build())).toEqual(['i', 'in']);
  });

  it('should record a resize as an output marker', () => {
    expect(toAsciicastEvent(frame('resize').withSize(200, 50).build())).toEqual([
      'o',
      '# Terminal resized to 200x50\r\n',
    ]);
    expect(toAsciicastEvent(frame('resize').build())).toBeNull();
  });

  it('should skip everything else', () => {
    expect(toAsciicastEvent(frame('idle').withDuration(200).build())).toBeNull();
    expect(toAsciicastEvent(frame('exit').withExitCode(0).build())).toBeNull();
    expect(toAsciicastEvent(frame('prompt').withData('$ ').build())).toBeNull();
  });

  it('should decode binary payloads', () => {
    const f = frame('stdout').withBinaryData(Buffer.from('ok', 'utf8')).build();

    expect(toAsciicastEvent(f)).toEqual(['o', 'ok']);
  });
});

describe('AsciicastRecorder', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ttyframe-rec-'));
    file = path.join(dir, 'session.cast');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should write the header on creation', () => {
    const recorder = new AsciicastRecorder(file, {
      width: 120,
      height: 40,
      title: 'demo',
      command: 'bash -l',
      env: { SHELL: '/bin/zsh' },
    });
    recorder.finish();

    const [header] = readCast(file);
    expect(header).toEqual({
      version: 2,
      width: 120,
      height: 40,
      timestamp: expect.any(Number),
      title: 'demo',
      command: 'bash -l',
      env: { SHELL: '/bin/zsh', TERM: 'xterm-256color' },
    });
  });

  it('should default SHELL when the environment has none', () => {
    const recorder = new AsciicastRecorder(file, { width: 80, height: 24, env: {} });
    recorder.finish();

    expect(recorder.header.env).toEqual({ SHELL: '/bin/sh', TERM: 'xterm-256color' });
    expect('title' in recorder.header).toBe(false);
  });

  it('should append events with elapsed seconds', () => {
    const recorder = new AsciicastRecorder(file, {
      width: 80,
      height: 24,
      env: {},
      clock: scriptedClock(1000, 1500.1234567, 2750),
    });

    expect(recorder.recordFrame(frame('stdout').withData('hi\r\n').build())).toBe(true);
    expect(recorder.recordFrame(frame('idle').withDuration(200).build())).toBe(false);
    expect(recorder.recordFrame(frame('stdin').withData('ls\n').build())).toBe(true);
    recorder.finish();

    expect(recorder.eventCount).toBe(2);
    expect(readCast(file).slice(1)).toEqual([
      [0.500123, 'o', 'hi\r\n'],
      [1.75, 'i', 'ls\n'],
    ]);
  });

  it('should never let elapsed time go backwards', () => {
    const recorder = new AsciicastRecorder(file, {
      width: 80,
      height: 24,
      env: {},
      clock: scriptedClock(0, 2000, 1500),
    });

    recorder.recordFrame(frame('stdout').withData('a').build());
    recorder.recordFrame(frame('stdout').withData('b').build());
    recorder.finish();

    expect(readCast(file).slice(1)).toEqual([
      [2, 'o', 'a'],
      [2, 'o', 'b'],
    ]);
  });

  it('should ignore frames after finish', () => {
    const recorder = new AsciicastRecorder(file, { width: 80, height: 24, env: {} });
    recorder.finish();
    recorder.finish();

    expect(recorder.finished).toBe(true);
    expect(recorder.recordFrame(FrameBuilder.of('stdout', 1).withData('late').build())).toBe(false);
    expect(readCast(file)).toHaveLength(1);
  });

  it('should fail when the file cannot be created', () => {
    const missing = path.join(dir, 'no-such-dir', 'x.cast');

    expect(() => new AsciicastRecorder(missing, { width: 80, height: 24 })).toThrow(
      `Cannot create recording at ${missing}`
    );
  });

  it.skipIf(!fs.existsSync('/dev/full'))('should fail when the header cannot be written', () => {
    expect(() => new AsciicastRecorder('/dev/full', { width: 80, height: 24 })).toThrow(RecordingError);
  });
});

describe('RecordingManager', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ttyframe-mgr-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should record only while active', () => {
    const manager = new RecordingManager();
    const file = path.join(dir, 'a.cast');

    manager.recordFrame(frame('stdout').withData('before').build());
    manager.startRecording(file, 100, 30, 'vim');
    manager.recordFrame(frame('stdout').withData('during').build());
    manager.stopRecording();
    manager.recordFrame(frame('stdout').withData('after').build());

    const lines = readCast(file);
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatchObject({ width: 100, height: 30, command: 'vim' });
    expect(lines[1]).toEqual([expect.any(Number), 'o', 'during']);
    expect(manager.isRecording).toBe(false);
  });

  it('should finish the previous recording when starting another', () => {
    const manager = new RecordingManager();
    manager.startRecording(path.join(dir, 'first.cast'), 80, 24);
    const first = manager.recorder;

    manager.startRecording(path.join(dir, 'second.cast'), 80, 24);

    expect(first?.finished).toBe(true);
    expect(manager.recorder?.path).toBe(path.join(dir, 'second.cast'));
    manager.stopRecording();
  });

  it('should allow stopping twice', () => {
    const manager = new RecordingManager();
    manager.startRecording(path.join(dir, 'b.cast'), 80, 24);

    manager.stopRecording();
    expect(() => manager.stopRecording()).not.toThrow();
  });

  it('should stay inactive when the destination is unusable', () => {
    const manager = new RecordingManager();

    expect(() => manager.startRecording(path.join(dir, 'missing', 'c.cast'), 80, 24)).toThrow(
      RecordingError
    );
    expect(manager.isRecording).toBe(false);
  });
});
