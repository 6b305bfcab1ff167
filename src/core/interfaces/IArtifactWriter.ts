/**
 * Produces the output file for a finished track
 */
export interface IArtifactWriter {
  /**
   * Write the artifact and return the download url that serves it
   */
  write(trackId: string, duration: number, prompt: string): Promise<string>;

  /**
   * Absolute path of a file name inside the artifact directory
   */
  resolve(fileName: string): string;
}
