// SPDX-License-Identifier: Apache-2.0

import {fileURLToPath} from 'node:url';
import path from 'node:path';
import fs from 'node:fs';
import {PathEx} from './src/business/utils/path-ex.js';
import {BranchworkError} from './src/core/errors/branchwork-error.js';

/**
 * Version of the running Branchwork package, from the npm environment or the nearest package.json.
 */
export function getBranchworkVersion(): string {
  if (process.env.npm_package_version) {
    return process.env.npm_package_version;
  }

  const __filename: string = fileURLToPath(import.meta.url);
  const __dirname: string = path.dirname(__filename);

  // sources live beside package.json, the build output one directory below it
  for (const candidate of [PathEx.resolve(__dirname, 'package.json'), PathEx.resolve(__dirname, '..', 'package.json')]) {
    if (fs.existsSync(candidate)) {
      const packageJson: {version?: unknown} = JSON.parse(fs.readFileSync(candidate, 'utf8'));
      if (typeof packageJson.version === 'string') {
        return packageJson.version;
      }
    }
  }

  throw new BranchworkError(`unable to determine the Branchwork version from ${__dirname}`);
}
