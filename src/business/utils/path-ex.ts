// SPDX-License-Identifier: Apache-2.0

import path from 'node:path';

export class PathEx {
  /**
   * Joins path segments taken from the command line, configuration or fixtures.
   */
  public static join(...paths: string[]): string {
    // nosemgrep
    return path.join(...paths);
  }

  /**
   * Resolves the given segments to an absolute path against the working directory.
   */
  public static resolve(...paths: string[]): string {
    // nosemgrep
    return path.resolve(...paths);
  }
}
