import { execFile } from 'node:child_process';
import fs from 'node:fs';
import path from 'node:path';
import { CollaboratorError, errorMessage } from '../shared/errors.js';
import type { Logger } from '../shared/logger.js';
import { resolvePath } from '../shared/utils.js';
import type { MediaDownloader } from './types.js';

export interface ExecOptions {
  timeout: number;
  maxBuffer: number;
}

export type ExecFn = (
  file: string,
  args: string[],
  opts: ExecOptions,
) => Promise<{ stdout: string; stderr: string }>;

const defaultExec: ExecFn = (file, args, opts) =>
  new Promise((resolve, reject) => {
    execFile(file, args, { ...opts, encoding: 'utf8' }, (err, stdout, stderr) => {
      if (err) {
        reject(err);
        return;
      }
      resolve({ stdout, stderr });
    });
  });

export interface YtDlpOptions {
  binary: string;
  outputDir: string;
  format: string;
  audioFormat: string;
  timeoutMs: number;
  logger: Logger;
  exec?: ExecFn;
}

/**
 * Audio-only download through the yt-dlp binary. Files land in
 * `<outputDir>/<youtube id>.<ext>`.
 */
export class YtDlpDownloader implements MediaDownloader {
  private readonly exec: ExecFn;
  private readonly outputDir: string;

  constructor(private readonly opts: YtDlpOptions) {
    this.exec = opts.exec ?? defaultExec;
    this.outputDir = resolvePath(opts.outputDir);
  }

  buildArgs(url: string): string[] {
    return [
      '--no-playlist',
      '--no-progress',
      '-f',
      this.opts.format,
      '-x',
      '--audio-format',
      this.opts.audioFormat,
      '-o',
      path.join(this.outputDir, '%(id)s.%(ext)s'),
      '--print',
      'after_move:filepath',
      url,
    ];
  }

  async download(url: string): Promise<string> {
    fs.mkdirSync(this.outputDir, { recursive: true });

    let stdout: string;
    try {
      ({ stdout } = await this.exec(this.opts.binary, this.buildArgs(url), {
        timeout: this.opts.timeoutMs,
        maxBuffer: 1024 * 1024,
      }));
    } catch (err) {
      throw new CollaboratorError('yt-dlp', `yt-dlp failed: ${errorMessage(err)}`, {
        url,
        timeout: this.opts.timeoutMs,
      });
    }

    const filePath = stdout
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter(Boolean)
      .pop();
    if (!filePath) {
      throw new CollaboratorError('yt-dlp', 'yt-dlp reported no output file', { url });
    }

    this.opts.logger.debug({ url, path: filePath }, 'Media downloaded');
    return filePath;
  }
}
