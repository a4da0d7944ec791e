/**
 * ReportCalc – Plugin index
 *
 * A plugin registers calculation functions and/or table transformers into
 * a pair of registries and returns them:
 *
 *   import { applyPlugins, createDefaultRegistries, extraCalculationsPlugin } from '../plugins';
 *
 *   const registries = applyPlugins(
 *     createDefaultRegistries(),
 *     extraCalculationsPlugin,
 *     ({ functions, transformers }) => ({
 *       functions: functions.register('lumen_ratio', (a, b) => ...),
 *       transformers,
 *     }),
 *   );
 *
 *   new FieldCalculator(report, { registry: registries.functions });
 *   transformTable(grid, steps, { transformers: registries.transformers });
 *
 * License: Apache-2.0
 */

import { createFunctionRegistry } from '../calculator/functions';
import type { FunctionRegistry } from '../calculator/functions';
import { createTransformerRegistry } from '../table/transformers';
import type { TransformerRegistry } from '../table/transformers';
import { builtinCalculationsPlugin } from './calculations';
import { tableTransformersPlugin } from './tables';

/////////////////////////////
// Individual plugin exports
/////////////////////////////

export { builtinCalculationsPlugin } from './calculations';
export { extraCalculationsPlugin } from './extras';
export { tableTransformersPlugin } from './tables';

/////////////////////////////
// Plugin composition types
/////////////////////////////

export interface Registries {
  functions: FunctionRegistry;
  transformers: TransformerRegistry;
}

export type Plugin = (registries: Registries) => Registries;

/** Empty registries. */
export function createRegistries(): Registries {
  return {
    functions: createFunctionRegistry(),
    transformers: createTransformerRegistry(),
  };
}

/**
 * Registries holding the built-in functions and transformers. Each call
 * returns a fresh pair.
 */
export function createDefaultRegistries(): Registries {
  return applyPlugins(createRegistries(), builtinCalculationsPlugin, tableTransformersPlugin);
}

/////////////////////////////
// Helper: applyPlugins    //
/////////////////////////////

/**
 * Apply plugins left-to-right: registries' = pN(...(p2(p1(registries)))).
 */
export function applyPlugins(registries: Registries, ...plugins: Plugin[]): Registries {
  return plugins.reduce((current, plugin) => plugin(current), registries);
}

/////////////////////////////
// Helper: createPluginSet //
/////////////////////////////

/**
 * Named, reusable group of plugins:
 *
 *   export const lightingPlugins = createPluginSet(
 *     'lighting',
 *     extraCalculationsPlugin,
 *     tableTransformersPlugin,
 *   );
 *
 *   const registries = lightingPlugins.attach(createRegistries());
 */
export interface PluginSet {
  /** Label for debugging. */
  readonly name: string;
  readonly plugins: readonly Plugin[];
  attach(registries: Registries): Registries;
}

export function createPluginSet(name: string, ...plugins: Plugin[]): PluginSet {
  const frozen: readonly Plugin[] = [...plugins];

  return {
    name,
    plugins: frozen,
    attach(registries: Registries): Registries {
      return applyPlugins(registries, ...frozen);
    },
  };
}
