import * as fs from 'node:fs';
import path from 'node:path';

/** 원자적 쓰기에 쓰는 파일 연산 (테스트에서 중간 실패를 흉내낼 수 있도록 분리) */
export interface FileIo {
  writeFileSync(file: string, data: string, encoding: 'utf8'): void;
  renameSync(from: string, to: string): void;
  rmSync(file: string, opts: { force: boolean }): void;
  mkdirSync(dir: string, opts: { recursive: true }): unknown;
}

export const nodeFileIo: FileIo = {
  writeFileSync: (file, data, encoding) => fs.writeFileSync(file, data, encoding),
  renameSync: (from, to) => fs.renameSync(from, to),
  rmSync: (file, opts) => fs.rmSync(file, opts),
  mkdirSync: (dir, opts) => fs.mkdirSync(dir, opts),
};

/**
 * 같은 디렉터리의 임시 파일에 쓴 뒤 rename
 * 도중에 죽어도 대상 파일은 이전 내용 그대로 남는다.
 */
export function writeFileAtomic(file: string, data: string, io: FileIo = nodeFileIo): void {
  const dir = path.dirname(file);
  io.mkdirSync(dir, { recursive: true });
  const tmp = path.join(dir, `.${path.basename(file)}.${process.pid}.tmp`);
  try {
    io.writeFileSync(tmp, data, 'utf8');
    io.renameSync(tmp, file);
  } catch (err) {
    io.rmSync(tmp, { force: true });
    throw err;
  }
}
