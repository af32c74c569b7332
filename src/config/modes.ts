/**
 * ABOUTME: Mode resolution for the loop configuration.
 * Folds a named sparse override onto the base loop settings, producing the
 * immutable effective configuration for one run.
 */

import { ConfigError } from '../errors.js';
import {
  DEFAULT_MODE_NAME,
  type EffectiveConfig,
  type LoopConfig,
  type ModeOverride,
} from './types.js';

function freezeEffective(config: LoopConfig): EffectiveConfig {
  return Object.freeze({
    ...config,
    gates: Object.freeze(config.gates.map((gate) => Object.freeze({ ...gate }))),
  });
}

/**
 * Names accepted by resolveModeOverrides for the given override map.
 */
export function knownModeNames(overrides: Record<string, ModeOverride>): string[] {
  return [DEFAULT_MODE_NAME, ...Object.keys(overrides).filter((name) => name !== DEFAULT_MODE_NAME)];
}

/**
 * Resolve the effective loop configuration for a mode.
 *
 * - absent or `default`: the base settings
 * - a key of `overrides`: each field present in the override replaces the
 *   base value, every other field is inherited from `base`
 * - anything else: ConfigError naming the mode and the known names
 */
export function resolveModeOverrides(
  modeName: string | undefined,
  base: LoopConfig,
  overrides: Record<string, ModeOverride>
): EffectiveConfig {
  const name = modeName?.trim();
  if (!name || name === DEFAULT_MODE_NAME) {
    return freezeEffective({ ...base, mode: DEFAULT_MODE_NAME });
  }

  if (!Object.prototype.hasOwnProperty.call(overrides, name)) {
    throw new ConfigError(
      `Unknown loop mode '${name}'. Known modes: ${knownModeNames(overrides).join(', ')}`
    );
  }

  const override = overrides[name] ?? {};
  const merged: LoopConfig = {
    maxIterations: override.maxIterations ?? base.maxIterations,
    noProgressLimit: override.noProgressLimit ?? base.noProgressLimit,
    gates: override.gates ?? base.gates,
    runnerTimeoutSeconds: override.runnerTimeoutSeconds ?? base.runnerTimeoutSeconds,
    iterationDelayMs: override.iterationDelayMs ?? base.iterationDelayMs,
    gateFailFast: override.gateFailFast ?? base.gateFailFast,
    mode: name,
  };

  return freezeEffective(merged);
}
