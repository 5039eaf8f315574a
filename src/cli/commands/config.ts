/**
 * Config CLI Command
 *
 * Lists every configuration option with its current value. Sensitive values are hidden.
 */

import { Command } from 'commander';
import { z } from 'zod';
import { config, collectConfigIssues, configRegistry, getAllEnvVars } from '../../config/index.js';
import { formatOutput } from '../utils/output.js';
import { handleCliError } from '../utils/errors.js';
import { typedAction } from '../utils/typed-action.js';

const HIDDEN = '(hidden)';

export function addConfigCommand(program: Command): void {
  program
    .command('config')
    .description('Show configuration options and their environment variables')
    .action(
      typedAction(z.object({}), async (_options, globalOpts) => {
        try {
          const options = getAllEnvVars(configRegistry).map((doc) => {
            const raw = process.env[doc.envKey];
            const value = raw === undefined ? doc.defaultValue : raw;
            return {
              section: doc.section,
              envKey: doc.envKey,
              type: doc.type,
              value: doc.sensitive && value !== undefined ? HIDDEN : value,
              description: doc.description,
            };
          });

          console.log(
            formatOutput(
              { nodeEnv: config.runtime.nodeEnv, issues: collectConfigIssues(config), options },
              globalOpts.format
            )
          );
        } catch (error) {
          handleCliError(error);
        }
      })
    );
}
