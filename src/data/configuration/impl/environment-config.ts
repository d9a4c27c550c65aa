// SPDX-License-Identifier: Apache-2.0

import {type ConfigAccessor} from '../api/config-accessor.js';
import {ConfigurationError} from '../api/configuration-error.js';
import {IllegalArgumentError} from '../../../core/errors/illegal-argument-error.js';

const ENVIRONMENT_SEPARATOR: string = '_';
const CONFIG_SEPARATOR: string = '.';

/**
 * A {@link ConfigAccessor} that reads configuration data from the environment.
 *
 * <p>
 * Only variables starting with `<PREFIX>_` are read. The prefix is stripped and the remainder is normalized to a
 * dotted lower-case property name, so with the prefix `BRANCHWORK` the variable `BRANCHWORK_LOG_LEVEL` is exposed as
 * `log.level`.
 */
export class EnvironmentConfig implements ConfigAccessor {
  private readonly data: Map<string, string> = new Map<string, string>();

  public constructor(
    public readonly prefix: string,
    private readonly environment: NodeJS.ProcessEnv = process.env,
  ) {
    if (!prefix || prefix.trim().length === 0) {
      throw new IllegalArgumentError('prefix must not be null, undefined, or empty', prefix);
    }

    this.refresh();
  }

  public refresh(): void {
    this.data.clear();

    const variablePrefix: string = `${this.prefix.toUpperCase()}${ENVIRONMENT_SEPARATOR}`;
    for (const [name, value] of Object.entries(this.environment)) {
      if (value === undefined || !name.toUpperCase().startsWith(variablePrefix)) {
        continue;
      }

      const key: string = EnvironmentConfig.toPropertyName(name.slice(variablePrefix.length));
      if (key.length > 0) {
        this.data.set(key, value);
      }
    }
  }

  public propertyNames(): Set<string> {
    return new Set<string>(this.data.keys());
  }

  public properties(): Map<string, string> {
    return new Map<string, string>(this.data);
  }

  public asString(key: string): string | null {
    return this.data.get(key) ?? null;
  }

  public asBoolean(key: string): boolean | null {
    const value: string | null = this.asString(key);
    if (value === null) {
      return null;
    }

    switch (value.trim().toLowerCase()) {
      case 'true': {
        return true;
      }
      case 'false': {
        return false;
      }
      default: {
        throw new ConfigurationError(`${key} must be 'true' or 'false', found: ${value}`, undefined, {key, value});
      }
    }
  }

  public asNumber(key: string): number | null {
    const value: string | null = this.asString(key);
    if (value === null) {
      return null;
    }

    const parsed: number = Number(value.trim());
    if (value.trim().length === 0 || !Number.isFinite(parsed)) {
      throw new ConfigurationError(`${key} must be a number, found: ${value}`, undefined, {key, value});
    }

    return parsed;
  }

  private static toPropertyName(variable: string): string {
    return variable
      .toLowerCase()
      .split(ENVIRONMENT_SEPARATOR)
      .filter(segment => segment.length > 0)
      .join(CONFIG_SEPARATOR);
  }
}
