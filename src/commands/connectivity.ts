import { probeApi } from '../market/probe';
import { CommandOptions, createContext } from './shared';

/**
 * Checks the public API endpoints the other commands depend on.
 *
 * @returns false when any endpoint failed
 */
export async function runTest(options: CommandOptions): Promise<boolean> {
  const context = createContext(options);
  context.log.header(`API connectivity (${context.config.apiUrl})`);

  const probe = await probeApi(context.client, context.currency, context.asOf, context.log);
  const passed = probe.checks.filter((check) => check.ok).length;

  context.log.divider();
  if (probe.ok) {
    context.log.success(`All ${passed} checks passed`);
  } else {
    context.log.error(`${probe.checks.length - passed} of ${probe.checks.length} checks failed`);
  }
  return probe.ok;
}
