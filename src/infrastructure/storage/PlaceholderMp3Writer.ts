import fs from 'fs/promises';
import path from 'path';
import { IArtifactWriter } from '../../core/interfaces/IArtifactWriter.js';

export const MP3_HEADER = Buffer.from([
  0xff, 0xfb, 0x90, 0x00, // MPEG-1 Layer III frame sync
  0x00, 0x00, 0x00, 0x00,
]);

export const SILENCE_BYTES_PER_SECOND = 1000;
export const METADATA_BLOCK_SIZE = 128;
const PROMPT_PREVIEW_CHARS = 50;

/**
 * Trailing tag: "Generated track: <first 50 chars of prompt>..." as UTF-8,
 * zero-padded (or cut at a character boundary) to 128 bytes
 */
export function buildMetadataBlock(prompt: string): Buffer {
  const preview = Array.from(prompt).slice(0, PROMPT_PREVIEW_CHARS).join('');
  const block = Buffer.alloc(METADATA_BLOCK_SIZE);
  block.write(`Generated track: ${preview}...`, 0, 'utf8');
  return block;
}

/**
 * Writes MP3-shaped stub files with no audio signal
 */
export class PlaceholderMp3Writer implements IArtifactWriter {
  private root: string;

  constructor(downloadsDir: string, private publicPrefix: string = '/downloads') {
    this.root = path.resolve(downloadsDir);
  }

  async write(trackId: string, duration: number, prompt: string): Promise<string> {
    const fileName = `${trackId}.mp3`;
    await fs.mkdir(this.root, { recursive: true });

    const content = Buffer.concat([
      MP3_HEADER,
      Buffer.alloc(duration * SILENCE_BYTES_PER_SECOND),
      buildMetadataBlock(prompt),
    ]);

    // Readers only ever see the complete file
    const target = this.resolve(fileName);
    const partial = `${target}.tmp`;
    await fs.writeFile(partial, content);
    await fs.rename(partial, target);

    return `${this.publicPrefix}/${fileName}`;
  }

  resolve(fileName: string): string {
    return path.join(this.root, fileName);
  }

  getDirectory(): string {
    return this.root;
  }
}
