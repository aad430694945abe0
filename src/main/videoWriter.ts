import { spawn } from 'child_process';
import { once } from 'events';
import { ImageFormat } from '../types/events';
import { logger } from './logger';

export interface VideoWriter {
  write(file: string, frames: readonly Buffer[], format: ImageFormat, fps: number): Promise<void>;
}

/**
 * Encodes packed RGB frames to an XVID-tagged MPEG-4 AVI by piping them
 * through an external ffmpeg process.
 */
export class FfmpegVideoWriter implements VideoWriter {
  constructor(private readonly ffmpegPath: string = 'ffmpeg') {}

  async write(file: string, frames: readonly Buffer[], format: ImageFormat, fps: number): Promise<void> {
    const args = [
      '-y',
      '-loglevel', 'error',
      '-f', 'rawvideo',
      '-pix_fmt', 'rgb24',
      '-s', `${format.width}x${format.height}`,
      '-r', fps.toFixed(3),
      '-i', 'pipe:0',
      '-c:v', 'mpeg4',
      '-vtag', 'xvid',
      '-q:v', '3',
      file,
    ];
    const proc = spawn(this.ffmpegPath, args, { stdio: ['pipe', 'ignore', 'pipe'] });
    let stderr = '';
    proc.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    const exited = new Promise<void>((resolve, reject) => {
      proc.once('error', reject);
      proc.once('close', (code) => {
        if (code === 0) resolve();
        else reject(new Error(`ffmpeg exited with code ${code}: ${stderr.trim()}`));
      });
    });
    // surfaced through `exited`; the pipe breaks when ffmpeg dies early
    proc.stdin.on('error', (err) => logger.debug(`[export] ffmpeg stdin: ${err.message}`));

    for (const frame of frames) {
      if (proc.stdin.destroyed) break;
      if (!proc.stdin.write(frame)) {
        await Promise.race([once(proc.stdin, 'drain'), exited]);
      }
    }
    proc.stdin.end();
    await exited;
  }
}
