import { TermDictionary } from '@refinaria/refiner';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import type { CommandContext } from './command-context';

import { DEFAULT_CONFIG } from '../config/refinaria-config';
import { TranscriptFileError } from '../errors/transcript-file-error';
import {
  listTranscripts,
  readTranscript,
  writeTranscript,
} from '../io/transcript-files';
import { formatCorrections, runCorrectCommand } from './correct-command';

vi.mock('../io/transcript-files', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../io/transcript-files')>();
  return {
    ...actual,
    listTranscripts: vi.fn(),
    readTranscript: vi.fn(),
    writeTranscript: vi.fn(),
  };
});

describe('runCorrectCommand', () => {
  const mockLogger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
  const stdout = { write: vi.fn() };
  const dictionary = new TermDictionary([
    { pattern: 'fenomenolojia', replacement: 'fenomenologia', kind: 'exact' },
  ]);

  function createContext(): CommandContext {
    return {
      logger: mockLogger,
      config: { ...DEFAULT_CONFIG, input: 'in', output: 'out' },
      stdout,
      stderr: { write: vi.fn() },
      createModel: () => {
        throw new Error('no model in the correct command');
      },
      checkModel: () =>
        Promise.reject(new Error('no model in the correct command')),
      dictionary,
    };
  }

  beforeEach(() => {
    vi.mocked(readTranscript).mockResolvedValue({
      text: 'A fenomenolojia de Husserl.',
      bom: true,
    });
    vi.mocked(writeTranscript).mockResolvedValue(undefined);
  });

  test('prints the corrections of each file', async () => {
    await expect(runCorrectCommand(createContext(), ['in/a.txt'])).resolves.toBe(
      0,
    );

    expect(stdout.write).toHaveBeenCalledWith(
      'in/a.txt: 1 corrections\n  2: fenomenolojia → fenomenologia\n',
    );
    expect(writeTranscript).not.toHaveBeenCalled();
  });

  test('reads every transcript of the input directory when no file is named', async () => {
    vi.mocked(listTranscripts).mockResolvedValue(['in/a.txt', 'in/b.txt']);

    await runCorrectCommand(createContext(), []);

    expect(listTranscripts).toHaveBeenCalledWith('in');
    expect(readTranscript).toHaveBeenCalledTimes(2);
  });

  test('writes the corrected text when asked', async () => {
    await runCorrectCommand(createContext(), ['in/a.txt'], { write: true });

    expect(writeTranscript).toHaveBeenCalledWith('out/corrected_a.txt', {
      text: 'A fenomenologia de Husserl.',
      bom: true,
    });
  });

  test('keeps going after a file fails', async () => {
    vi.mocked(readTranscript).mockRejectedValueOnce(
      new TranscriptFileError('Failed to read in/a.txt', 'in/a.txt'),
    );

    await expect(
      runCorrectCommand(createContext(), ['in/a.txt', 'in/b.txt']),
    ).resolves.toBe(1);

    expect(mockLogger.error).toHaveBeenCalledWith(
      'Failed to correct in/a.txt:',
      expect.any(TranscriptFileError),
    );
    expect(stdout.write).toHaveBeenCalledTimes(1);
  });
});

describe('formatCorrections', () => {
  test('lists suggestions after the applied corrections', () => {
    expect(
      formatCorrections('aula.txt', { corrected: 'Heideger', applied: [] }, [
        {
          word: 'Heideger',
          suggestion: 'Heidegger',
          similarity: 0.889,
          offset: 0,
        },
      ]),
    ).toBe('aula.txt: 0 corrections\n  0: Heideger ~ Heidegger? (0.89)');
  });
});
