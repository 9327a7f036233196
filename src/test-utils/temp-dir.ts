import os from 'node:os';
import path from 'node:path';
import fs from 'fs-extra';

export const makeTempDir = (prefix = 'memories-fetch-'): Promise<string> => fs.mkdtemp(path.join(os.tmpdir(), prefix));

export const removeTempDir = (dir: string): Promise<void> => fs.remove(dir);
