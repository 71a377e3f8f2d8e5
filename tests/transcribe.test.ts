import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { ModelLoadError, TranscriptionFailedError } from '../src/pipeline/errors';
import { parseRunnerOutput, readRunnerOutput, WhisperxTranscriber } from '../src/pipeline/transcribe';

const execaMock = vi.hoisted(() =>
  vi.fn(async (_cmd: string, _args: readonly string[], _opts?: object) => ({ stdout: '' }))
);

vi.mock('execa', () => ({ execa: execaMock }));

const runnerOutput = {
  language: 'en',
  duration: 4,
  segments: [
    { start: 2, end: 4, text: 'Second.', avg_logprob: 0 },
    { start: 0, end: 2, text: 'First.', confidence: 0.8 },
  ],
};

function processFailure(stderr: string) {
  return Object.assign(new Error('Command failed with exit code 1'), { stderr, stdout: '', exitCode: 1 });
}

describe('parseRunnerOutput', () => {
  it('should order segments and derive confidence', () => {
    expect(parseRunnerOutput(runnerOutput)).toEqual({
      language: 'en',
      sourceDuration: 4,
      segments: [
        { start: 0, end: 2, text: 'First.', confidence: 0.8 },
        { start: 2, end: 4, text: 'Second.', confidence: 1 },
      ],
    });
  });

  it('should fill in defaults', () => {
    const t = parseRunnerOutput({ segments: [{ startSec: 1, endSec: 0.5, text: 'Hi.', confidence: 1.7 }] });
    expect(t).toEqual({
      language: 'unknown',
      sourceDuration: 1,
      segments: [{ start: 1, end: 1, text: 'Hi.', confidence: 1 }],
    });
  });

  it('should reject output without segments', () => {
    expect(() => parseRunnerOutput({ language: 'en' })).toThrow(TranscriptionFailedError);
    expect(() => parseRunnerOutput({ segments: [3] })).toThrow(TranscriptionFailedError);
  });
});

describe('readRunnerOutput', () => {
  it('should wrap unreadable files', async () => {
    await expect(readRunnerOutput(path.join(os.tmpdir(), 'missing-runner-output.json'))).rejects.toThrow(
      TranscriptionFailedError
    );
  });
});

describe('WhisperxTranscriber', () => {
  let dir: string;
  let audio: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'transcribe-'));
    audio = path.join(dir, 'talk.wav');
    await fs.outputFile(audio, 'RIFF');
    execaMock.mockReset();
    execaMock.mockImplementation(async (_cmd, args) => {
      if (args.includes('--model')) await fs.outputJson(args[args.length - 1], runnerOutput);
      return { stdout: '{"ok":true}' };
    });
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('should run the local runner and clean up its output', async () => {
    const transcriber = new WhisperxTranscriber({ localBin: 'runner' });
    const transcript = await transcriber.transcribe(audio, 'small');
    await transcriber.transcribe(audio, 'small');

    const outPath = path.join(dir, 'talk.small.transcript.json');
    expect(execaMock.mock.calls.map((c) => [c[0], c[1]])).toEqual([
      ['runner', ['--health']],
      ['runner', ['--model', 'small', audio, outPath]],
      ['runner', ['--model', 'small', audio, outPath]],
    ]);
    expect(transcript.segments).toHaveLength(2);
    expect(await fs.pathExists(outPath)).toBe(false);
  });

  it('should mount the audio directory into the container', async () => {
    const transcriber = new WhisperxTranscriber({ image: 'runner:test', skipHealthCheck: true });
    await transcriber.transcribe(audio, 'tiny');
    expect(execaMock.mock.calls[0]).toEqual(['docker', ['image', 'inspect', 'runner:test']]);
    expect(execaMock.mock.calls[1][1]).toEqual([
      'run',
      '--rm',
      '-v',
      `${dir}:${dir}`,
      'runner:test',
      '--model',
      'tiny',
      audio,
      path.join(dir, 'talk.tiny.transcript.json'),
    ]);
  });

  it('should fail preflight when the image is missing', async () => {
    execaMock.mockRejectedValueOnce(processFailure('No such image'));
    const transcriber = new WhisperxTranscriber({ image: 'runner:test' });
    await expect(transcriber.transcribe(audio, 'tiny')).rejects.toThrow(ModelLoadError);
  });

  it('should treat out-of-memory as a model load failure', async () => {
    const transcriber = new WhisperxTranscriber({ skipHealthCheck: true });
    execaMock.mockRejectedValueOnce(processFailure('RuntimeError: CUDA out of memory'));
    await expect(transcriber.transcribe(audio, 'large-v3')).rejects.toThrow(ModelLoadError);
  });

  it('should report other runner failures as transcription failures', async () => {
    const transcriber = new WhisperxTranscriber({ skipHealthCheck: true });
    execaMock.mockRejectedValueOnce(processFailure('segfault'));
    await expect(transcriber.transcribe(audio, 'base')).rejects.toThrow(TranscriptionFailedError);
  });
});
