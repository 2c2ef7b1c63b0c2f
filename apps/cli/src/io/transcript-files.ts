import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { TranscriptFileError } from '../errors/transcript-file-error';

const UTF8_BOM = Buffer.from([0xef, 0xbb, 0xbf]);

// Throws on malformed input instead of substituting U+FFFD
const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Transcript contents. `bom` records whether the file started with a UTF-8
 * byte order mark so the refined file can be written the same way.
 */
export interface Transcript {
  text: string;
  bom: boolean;
}

/**
 * @throws TranscriptFileError when the file cannot be read or is not valid
 * UTF-8
 */
export async function readTranscript(filePath: string): Promise<Transcript> {
  let bytes: Buffer;
  try {
    bytes = await fs.readFile(filePath);
  } catch (error) {
    throw TranscriptFileError.fromError(
      `Failed to read ${filePath}`,
      filePath,
      error,
    );
  }

  const bom = bytes.subarray(0, 3).equals(UTF8_BOM);
  let text: string;
  try {
    text = utf8Decoder.decode(bom ? bytes.subarray(3) : bytes);
  } catch (error) {
    throw new TranscriptFileError(
      `Failed to read ${filePath}: not valid UTF-8`,
      filePath,
      { cause: error },
    );
  }
  return { text, bom };
}

/**
 * Writes UTF-8 text, creating the directory when needed
 *
 * @throws TranscriptFileError when the file cannot be written
 */
export async function writeTranscript(
  filePath: string,
  transcript: Transcript,
): Promise<void> {
  const body = Buffer.from(transcript.text, 'utf8');
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(
      filePath,
      transcript.bom ? Buffer.concat([UTF8_BOM, body]) : body,
    );
  } catch (error) {
    throw TranscriptFileError.fromError(
      `Failed to write ${filePath}`,
      filePath,
      error,
    );
  }
}

/**
 * `.txt` files directly inside `directory`, sorted by name
 *
 * @throws TranscriptFileError when the directory cannot be listed
 */
export async function listTranscripts(directory: string): Promise<string[]> {
  let names: string[];
  try {
    names = await fs.readdir(directory);
  } catch (error) {
    throw TranscriptFileError.fromError(
      `Failed to list ${directory}`,
      directory,
      error,
    );
  }

  return names
    .filter((name) => name.toLowerCase().endsWith('.txt'))
    .sort()
    .map((name) => path.join(directory, name));
}

/**
 * `<outputDir>/<prefix><file name>`
 */
export function outputPathFor(
  inputPath: string,
  outputDir: string,
  prefix: string,
): string {
  return path.join(outputDir, `${prefix}${path.basename(inputPath)}`);
}
