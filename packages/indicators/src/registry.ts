/**
 * @fileoverview Indicator plugin registry.
 * @module @tradeloop/indicators/registry
 */

import type { IndicatorName } from '@tradeloop/contracts';
import type { IndicatorPlugin } from './types.js';
import { maCrossoverPlugin } from './plugins/ma-crossover.js';
import { rsiPlugin } from './plugins/rsi.js';
import { divergencePlugin } from './plugins/divergence.js';
import { bollingerPlugin } from './plugins/bollinger.js';
import { volumePlugin } from './plugins/volume.js';

/**
 * Ordered set of indicator plugins. Plugins run in registration order, so a
 * plugin must be registered after everything it `requires`.
 */
export class IndicatorRegistry {
  private readonly plugins = new Map<IndicatorName, IndicatorPlugin>();

  /**
   * @throws {Error} If a plugin with the same name is already registered, or
   *   a required plugin is not
   */
  register(plugin: IndicatorPlugin): this {
    if (this.plugins.has(plugin.name)) {
      throw new Error(`Indicator "${plugin.name}" is already registered`);
    }
    for (const dependency of plugin.requires ?? []) {
      if (!this.plugins.has(dependency)) {
        throw new Error(`Indicator "${plugin.name}" requires "${dependency}" to be registered first`);
      }
    }
    this.plugins.set(plugin.name, plugin);
    return this;
  }

  get(name: IndicatorName): IndicatorPlugin | undefined {
    return this.plugins.get(name);
  }

  has(name: IndicatorName): boolean {
    return this.plugins.has(name);
  }

  list(): IndicatorPlugin[] {
    return Array.from(this.plugins.values());
  }
}

/**
 * Registry with the five built-in indicators in fusion order.
 */
export function createDefaultRegistry(): IndicatorRegistry {
  return new IndicatorRegistry()
    .register(maCrossoverPlugin)
    .register(rsiPlugin)
    .register(divergencePlugin)
    .register(bollingerPlugin)
    .register(volumePlugin);
}
