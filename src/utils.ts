import path from 'path';
import bytes from 'bytes';
import _ from 'lodash';
import { glob } from 'glob';
import * as fs from 'fs';
import * as os from 'os';
import * as fsPromise from 'fs/promises';
import * as core from '@actions/core';

export class Utils {
  static async checkPathExists(path: string): Promise<boolean> {
    return await fsPromise
      .access(path, fs.constants.F_OK)
      .then(() => true)
      .catch(() => false);
  }

  static async isDirectory(path: string): Promise<boolean> {
    return await fsPromise
      .stat(path)
      .then((stats) => stats.isDirectory())
      .catch(() => false);
  }

  static async copyPreservingTimestamps(sourcePath: string, destinationPath: string): Promise<void> {
    await fsPromise.copyFile(sourcePath, destinationPath);

    // timestamps are best effort once the copy exists
    try {
      const sourceStats = await fsPromise.stat(sourcePath);
      await fsPromise.utimes(destinationPath, sourceStats.atime, sourceStats.mtime);
    } catch (error) {
      Utils.warning(`Unable to preserve timestamps on '${destinationPath}': ${Utils.errorMessage(error)}`);
    }
  }

  static async listFiles(pattern: string, cwd: string): Promise<string[]> {
    const files = await glob(pattern, {
      cwd,
      dot: true,
      nodir: true,
      absolute: true
    });

    return _.sortBy(files);
  }

  static formatSize(size: number, unit: 'GB' | 'MB', decimalPlaces: number): string {
    return (
      bytes.format(size, {
        unit,
        decimalPlaces,
        fixedDecimals: true,
        unitSeparator: ' '
      }) ?? `${size} B`
    );
  }

  static createReleaseTag(now: Date): string {
    const pad = (value: number) => _.padStart(String(value), 2, '0');
    const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
    const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;

    return `wheels-${date}-${time}`;
  }

  static async appendOutput(outputPath: string, name: string, value: string): Promise<void> {
    await fsPromise.appendFile(outputPath, `${name}=${value}\n`, { encoding: 'utf8' });
  }

  static async listDirectoryEntries(directory: string): Promise<string[]> {
    return await fsPromise
      .readdir(directory)
      .then((entries) => _.sortBy(entries))
      .catch((error: Error) => {
        Utils.warning(`Unable to list '${directory}': ${error.message}`);
        return [];
      });
  }

  static relativeTo(root: string, filePath: string): string {
    return path.relative(root, filePath).split(path.sep).join('/');
  }

  static warning(message: string): void {
    core.warning(message);
    process.stderr.write(`WARNING: ${message}${os.EOL}`);
  }

  static error(message: string): void {
    core.error(message);
    process.stderr.write(`ERROR: ${message}${os.EOL}`);
  }

  static errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
