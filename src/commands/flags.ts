// SPDX-License-Identifier: Apache-2.0

import {type Argv} from 'yargs';

export interface Definition {
  describe: string;
  defaultValue?: boolean | string | number;
  alias?: string;
  type: 'boolean' | 'string' | 'number';
}

export interface CommandFlag {
  constName: string;
  name: string;
  definition: Definition;
}

export class Flags {
  public static readonly devMode: CommandFlag = {
    constName: 'devMode',
    name: 'dev',
    definition: {
      describe: 'Enable developer mode',
      defaultValue: false,
      type: 'boolean',
    },
  };

  /**
   * Registers the flags as options of the given yargs instance, keeping each flag's default value.
   */
  public static setCommandFlags<T>(y: Argv<T>, ...commandFlags: CommandFlag[]): void {
    for (const flag of commandFlags) {
      const {defaultValue, ...definition} = flag.definition;
      y.option(flag.name, {
        ...definition,
        default: defaultValue,
      });
    }
  }
}
