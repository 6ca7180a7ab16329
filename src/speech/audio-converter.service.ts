import { Injectable, Logger } from '@nestjs/common';
import { spawn } from 'node:child_process';

// ffmpeg 로 MP3 → OGG/Opus 변환. ffmpeg 가 PATH 에 있어야 한다.
@Injectable()
export class AudioConverterService {
  private readonly logger = new Logger(AudioConverterService.name);

  constructor(private readonly command = 'ffmpeg') {}

  mp3ToOgg(mp3: Buffer): Promise<Buffer> {
    const args = [
      '-hide_banner',
      '-loglevel',
      'error',
      '-f',
      'mp3',
      '-i',
      'pipe:0',
      '-c:a',
      'libopus',
      '-b:a',
      '48k',
      '-f',
      'ogg',
      'pipe:1',
    ];

    return new Promise<Buffer>((resolve, reject) => {
      const child = spawn(this.command, args, { stdio: ['pipe', 'pipe', 'pipe'] });
      const output: Buffer[] = [];
      const errors: Buffer[] = [];

      child.stdout.on('data', (chunk: Buffer) => output.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => errors.push(chunk));
      child.on('error', reject);
      child.stdin.on('error', reject);
      child.on('close', (code) => {
        if (code === 0) {
          const ogg = Buffer.concat(output);
          this.logger.debug(`Converted ${mp3.length} bytes of MP3 to ${ogg.length} bytes of OGG`);
          resolve(ogg);
        } else {
          const detail = Buffer.concat(errors).toString('utf-8').trim();
          reject(new Error(`${this.command} exited with code ${code}${detail ? `: ${detail}` : ''}`));
        }
      });

      child.stdin.end(mp3);
    });
  }
}
