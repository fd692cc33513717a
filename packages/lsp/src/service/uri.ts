import { resolve } from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';

export function toFileUri(filePath: string): string {
  if (filePath.startsWith('file://')) {
    return filePath;
  }
  return pathToFileURL(resolve(filePath)).toString();
}

export function fromFileUri(fileUriOrPath: string): string {
  if (fileUriOrPath.startsWith('file://')) {
    return fileURLToPath(fileUriOrPath);
  }
  return fileUriOrPath;
}
