import { ConfigError } from '../../errors/ConfigError.js';
import { base45Strategy } from './base45.js';
import { base58Strategy } from './base58.js';
import { base64Strategy } from './base64.js';
import { base91Strategy } from './base91.js';
import { rotNStrategy } from './rotN.js';
import { superRotStrategy } from './superRot.js';
import { STRATEGY_NAMES, type StrategyName, type StrategyRegistration } from './types.js';

const REGISTRATIONS: readonly StrategyRegistration[] = [
  base64Strategy,
  base58Strategy,
  base45Strategy,
  base91Strategy,
  superRotStrategy,
  rotNStrategy,
];

export const STRATEGY_REGISTRY: ReadonlyMap<StrategyName, StrategyRegistration> = new Map(
  REGISTRATIONS.map((registration) => [registration.name, registration])
);

export function isStrategyName(name: string): name is StrategyName {
  return STRATEGY_NAMES.some((known) => known === name);
}

/** Resolve a configured name. Unknown names are a configuration error. */
export function getStrategy(name: string): StrategyRegistration {
  const registration = isStrategyName(name) ? STRATEGY_REGISTRY.get(name) : undefined;
  if (!registration) {
    throw new ConfigError(`Unknown strategy "${name}"`, {
      strategy: name,
      available: [...STRATEGY_NAMES],
    });
  }
  return registration;
}

export function listStrategies(): StrategyRegistration[] {
  return [...REGISTRATIONS];
}
