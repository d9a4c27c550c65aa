// SPDX-License-Identifier: Apache-2.0

/**
 * Dependency injection tokens
 */
export const InjectTokens = {
  LogLevel: Symbol.for('LogLevel'),
  DevelopmentMode: Symbol.for('DevelopmentMode'),
  LogsDirectory: Symbol.for('LogsDirectory'),
  ConfigAccessor: Symbol.for('ConfigAccessor'),
  BranchworkLogger: Symbol.for('BranchworkLogger'),
  ErrorHandler: Symbol.for('ErrorHandler'),
  TreeDescriptionLoader: Symbol.for('TreeDescriptionLoader'),
} as const;
