import { Inject, Injectable, Logger } from '@nestjs/common';
import { mkdir, writeFile } from 'node:fs/promises';
import { isAbsolute, posix, relative, resolve, sep } from 'node:path';
import { BRIEF_CONFIG, BriefConfig } from '../config/brief.config';

// 출력 디렉터리(<output>/<date>/)에 오디오와 brief.md 를 쓰고 공개 URL 을 만든다
@Injectable()
export class BriefStorageService {
  private readonly logger = new Logger(BriefStorageService.name);

  constructor(@Inject(BRIEF_CONFIG) private readonly config: BriefConfig) {}

  dayDir(date: string): string {
    return posix.join(this.config.outputDir.replace(/\\/g, '/'), date);
  }

  async ensureDayDir(date: string): Promise<string> {
    const dir = this.dayDir(date);
    await mkdir(dir, { recursive: true });
    return dir;
  }

  // 저장된 파일의 상대 경로를 돌려준다
  async save(date: string, fileName: string, data: Buffer | string): Promise<string> {
    const dir = await this.ensureDayDir(date);
    const path = posix.join(dir, fileName);
    await writeFile(path, data);
    this.logger.log(`Wrote ${path}`);
    return path;
  }

  // raw.githubusercontent.com 주소. 경로는 저장소 루트(작업 디렉터리) 기준.
  // 저장소가 설정되지 않았거나 파일이 저장소 밖에 있으면 undefined
  publicUrl(filePath: string): string | undefined {
    const { githubRepo, githubBranch } = this.config;
    if (!githubRepo) {
      return undefined;
    }
    const repoPath = relative(process.cwd(), resolve(filePath));
    if (!repoPath || repoPath === '..' || repoPath.startsWith(`..${sep}`) || isAbsolute(repoPath)) {
      this.logger.warn(`${filePath} is outside the repository; no public URL`);
      return undefined;
    }
    return `https://raw.githubusercontent.com/${githubRepo}/${githubBranch}/${repoPath.split(sep).join('/')}`;
  }
}
