import * as fs from 'fs/promises';
import { AlreadyExistsError, FilesystemError, isErrnoException } from '../errors';

/**
 * Fail if anything (file, directory, symlink, dangling or not) sits at `projectRoot`
 */
export async function assertTargetAvailable(projectRoot: string): Promise<void> {
  try {
    await fs.lstat(projectRoot);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return;
    }
    throw new FilesystemError('inspect', projectRoot, error);
  }
  throw new AlreadyExistsError(projectRoot);
}
