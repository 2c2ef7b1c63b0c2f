import { listTranscripts } from '../io/transcript-files';

/**
 * Files named on the command line, or every transcript of the input directory
 */
export async function resolveInputs(
  files: readonly string[],
  inputDir: string,
): Promise<string[]> {
  return files.length > 0 ? [...files] : listTranscripts(inputDir);
}
