// Interview Assistant Bot - Inbound media temp files
// Each audio event downloads into its own file under the downloads directory.
// The file is removed after the event is processed successfully and left on
// disk when processing fails, so it can be inspected or retried by hand.

import { mkdir, readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { v4 as uuidv4 } from "uuid";
import type { AudioFormat, MediaDownload } from "./types.js";
import { TransportError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";

export interface DownloadedMedia {
  path: string;
  data: Buffer;
}

export class MediaDownloader {
  private readonly dir: string;
  private readonly logger: Logger;

  constructor(dir: string, logger: Logger = createLogger("MediaDownloader")) {
    this.dir = dir;
    this.logger = logger;
  }

  /**
   * Downloads the media to `<dir>/<uuid>.<format>` and reads it back.
   *
   * @throws TransportError if the download or the read-back fails.
   */
  async fetch(download: MediaDownload, format: AudioFormat): Promise<DownloadedMedia> {
    const path = join(this.dir, `${uuidv4()}.${format}`);
    try {
      await mkdir(this.dir, { recursive: true });
      await download(path);
      const data = await readFile(path);
      this.logger.debug(`Downloaded ${data.byteLength} bytes to ${path}`);
      return { path, data };
    } catch (err) {
      throw new TransportError(`Failed to download media to ${path}`, err);
    }
  }

  /** Deletes a processed file. A failed delete is logged, not thrown. */
  async discard(media: DownloadedMedia): Promise<void> {
    try {
      await rm(media.path, { force: true });
    } catch (err) {
      this.logger.warn(`Could not delete ${media.path}`, err);
    }
  }

  /** Logs a file that is being kept after a failure. */
  retain(media: DownloadedMedia, reason: string): void {
    this.logger.warn(`Keeping ${media.path} after failed processing: ${reason}`);
  }
}
