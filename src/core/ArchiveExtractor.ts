import * as fs from 'fs-extra';
import * as tar from 'tar';
import bz2 from 'unbzip2-stream';
import { pipeline } from 'stream/promises';
import { ArchiveFormat, InterpreterFamily } from '../types/Runtime';
import { FilesystemError, errorMessage } from '../types/Errors';
import { FileSystem } from '../utils/FileSystem';
import { logger } from '../utils/Logger';

const FORMAT_BY_FAMILY: Record<InterpreterFamily, ArchiveFormat> = {
  cpython: 'tar.gz',
  pypy: 'tar.bz2',
};

export function archiveFormatFor(family: InterpreterFamily): ArchiveFormat {
  return FORMAT_BY_FAMILY[family];
}

/**
 * Unpack `archivePath` into `targetDir`, keeping entry paths and modes.
 *
 * Entries are written to a staging directory beside the target which is
 * renamed into place once the whole archive is out, so `targetDir` only ever
 * exists complete.
 */
export async function extractArchive(
  archivePath: string,
  targetDir: string,
  format: ArchiveFormat
): Promise<void> {
  const staging = `${targetDir}.${process.pid}.tmp`;
  logger.debug(`Extracting ${archivePath} (${format}) to ${targetDir}`);

  try {
    await FileSystem.remove(staging);
    await FileSystem.ensureDirExists(staging);

    switch (format) {
      case 'tar.gz':
        await untar(archivePath, staging);
        break;
      case 'tar.bz2':
        await extractBzip2(archivePath, staging);
        break;
    }

    await FileSystem.publish(staging, targetDir);
  } catch (error) {
    await FileSystem.remove(staging);
    if (error instanceof FilesystemError) throw error;
    throw new FilesystemError(
      archivePath,
      `Failed to extract ${archivePath}: ${errorMessage(error)}`,
      { cause: error }
    );
  }
}

async function untar(file: string, cwd: string): Promise<void> {
  // gzip is detected from the stream header
  await tar.x({ file, cwd, strict: true });
}

async function extractBzip2(archivePath: string, cwd: string): Promise<void> {
  const tarball = `${cwd}.tar`;
  try {
    await pipeline(fs.createReadStream(archivePath), bz2(), fs.createWriteStream(tarball));
    await untar(tarball, cwd);
  } finally {
    await fs.remove(tarball);
  }
}
