// SPDX-License-Identifier: Apache-2.0

/**
 * Implementations of config accessor provide the necessary methods to access configuration properties.
 */
export interface ConfigAccessor {
  /**
   * Enumerates the set of property names that are available in the configuration source.
   */
  propertyNames(): Set<string>;

  /**
   * Enumerates the key-value pairs that are available in the configuration source.
   */
  properties(): Map<string, string>;

  /**
   * Retrieves the value of the specified key and converts it to a boolean.
   *
   * @param key - dotted property name, e.g. `dev.mode`
   * @returns the value, or null when the key is not set
   * @throws ConfigurationError if the value is neither `true` nor `false`
   */
  asBoolean(key: string): boolean | null;

  /**
   * Retrieves the value of the specified key and converts it to a number.
   *
   * @throws ConfigurationError if the value is not a finite number
   */
  asNumber(key: string): number | null;

  asString(key: string): string | null;
}
