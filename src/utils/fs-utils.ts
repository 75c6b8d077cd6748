/**
 * 文件写入工具
 */

import fs from 'fs';
import path from 'path';

/**
 * 先写临时文件再重命名，避免留下写了一半的文件
 */
export function writeFileAtomic(filePath: string, content: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.${process.pid}.tmp`;
  fs.writeFileSync(tempPath, content, 'utf8');
  fs.renameSync(tempPath, filePath);
}
