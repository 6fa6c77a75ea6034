/**
 * Convert Command
 *
 * Converts every supported video in a directory to the target size.
 */

import { createBatchConverter } from '@letterbox/processing';
import { createLogger } from '@letterbox/utils';
import { buildConverterConfig, type ConvertCommandOptions } from '../config/index.js';
import { ConsoleReporter } from '../lib/reporter.js';
import { printWarning } from '../lib/output.js';

const log = createLogger({ component: 'cli' });

export async function convertCommand(
  inputDir: string | undefined,
  options: ConvertCommandOptions
): Promise<void> {
  const config = buildConverterConfig(inputDir, options);
  log.debug({ config }, 'Resolved configuration');

  const reporter = new ConsoleReporter();
  const controller = new AbortController();

  const onInterrupt = () => {
    reporter.stop();
    printWarning('Interrupted, stopping the current conversion...');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    await createBatchConverter(config, reporter).run(config, { signal: controller.signal });
  } finally {
    process.off('SIGINT', onInterrupt);
    reporter.stop();
  }
}
