import { UnresolvedVariableError, SourceLocation } from '../errors';

/**
 * Layered, read-only configuration for one experiment run.
 *
 * Values are looked up by dotted key (`system.size`) through four layers, highest
 * precedence first:
 *
 * 1. `override`  – batch / command-line overrides supplied by the host
 * 2. `named`     – the named configuration the experiment was started with
 * 3. `plugin`    – defaults contributed by registered plug-ins
 * 4. `species`   – species defaults
 *
 * Each layer may spell a key either flat (`{ 'system.size': 10 }`) or nested
 * (`{ system: { size: 10 } }`). The context never changes after construction;
 * `withLayer` returns a new context, so an interpreter can hold one snapshot for a
 * whole generation while the host prepares the next one.
 */
export type ScalarValue = number | string | boolean | null;
export type ConfigValue =
  | ScalarValue
  | readonly ConfigValue[]
  | { readonly [key: string]: ConfigValue };
export type ConfigMapping = { readonly [key: string]: ConfigValue };

export type LayerName = 'override' | 'named' | 'plugin' | 'species';

/** Precedence order used by every lookup. */
export const LAYER_ORDER: readonly LayerName[] = ['override', 'named', 'plugin', 'species'];

export function isMapping(value: ConfigValue | undefined): value is ConfigMapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function own(mapping: ConfigMapping, key: string): ConfigValue | undefined {
  return Object.prototype.hasOwnProperty.call(mapping, key) ? mapping[key] : undefined;
}

/**
 * Look a dotted path up in a single mapping, accepting any mix of flat and nested
 * spellings (`a.b.c`, `{ a: { 'b.c': … } }`, …). The longest flat key wins.
 */
function lookupPath(mapping: ConfigMapping, parts: readonly string[]): ConfigValue | undefined {
  for (let take = parts.length; take >= 1; take--) {
    const value = own(mapping, parts.slice(0, take).join('.'));
    if (value === undefined) continue;
    if (take === parts.length) return value;
    if (isMapping(value)) {
      const nested = lookupPath(value, parts.slice(take));
      if (nested !== undefined) return nested;
    }
  }
  return undefined;
}

function deepFreeze<T extends ConfigValue>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/** Expand flat dotted keys into nested mappings and merge `top` over `base`. */
function mergeInto(base: { [key: string]: ConfigValue }, top: ConfigMapping): void {
  for (const [key, value] of Object.entries(top)) {
    const [head, ...rest] = key.split('.');
    const expanded: ConfigValue = rest.length
      ? rest.reduceRight<ConfigValue>((acc, part) => ({ [part]: acc }), value)
      : value;
    const existing = own(base, head);
    if (isMapping(expanded) && isMapping(existing)) {
      const copy: { [key: string]: ConfigValue } = { ...existing };
      mergeInto(copy, expanded);
      base[head] = copy;
    } else if (isMapping(expanded)) {
      const copy: { [key: string]: ConfigValue } = {};
      mergeInto(copy, expanded);
      base[head] = copy;
    } else {
      base[head] = expanded;
    }
  }
}

export class ConfigurationContext {
  private readonly layers: ReadonlyMap<LayerName, ConfigMapping>;

  constructor(layers: Partial<Record<LayerName, ConfigMapping>> = {}) {
    const frozen = new Map<LayerName, ConfigMapping>();
    for (const name of LAYER_ORDER) {
      const layer = layers[name];
      if (layer) frozen.set(name, deepFreeze(structuredClone(layer)));
    }
    this.layers = frozen;
  }

  /** Context with a single `named` layer. */
  static from(mapping: ConfigMapping = {}): ConfigurationContext {
    return new ConfigurationContext({ named: mapping });
  }

  /** New context with `mapping` replacing the given layer. */
  withLayer(name: LayerName, mapping: ConfigMapping): ConfigurationContext {
    const layers: Partial<Record<LayerName, ConfigMapping>> = {};
    for (const [existing, value] of this.layers) layers[existing] = value;
    layers[name] = mapping;
    return new ConfigurationContext(layers);
  }

  layer(name: LayerName): ConfigMapping | undefined {
    return this.layers.get(name);
  }

  /** Resolve a dotted key through the layers; `undefined` when no layer defines it. */
  get(key: string | readonly string[]): ConfigValue | undefined {
    const parts = typeof key === 'string' ? key.split('.') : key;
    for (const name of LAYER_ORDER) {
      const layer = this.layers.get(name);
      if (!layer) continue;
      const value = lookupPath(layer, parts);
      if (value !== undefined) return value;
    }
    return undefined;
  }

  has(key: string | readonly string[]): boolean {
    return this.get(key) !== undefined;
  }

  /** Like {@link get} but throws `UnresolvedVariableError` for missing keys. */
  require(key: string | readonly string[], location?: SourceLocation): ConfigValue {
    const value = this.get(key);
    if (value === undefined) {
      throw new UnresolvedVariableError(
        typeof key === 'string' ? key : key.join('.'),
        'configuration',
        location
      );
    }
    return value;
  }

  /** Numeric lookup with fallback; non-numeric values are ignored. */
  number(key: string, fallback: number): number {
    const value = this.get(key);
    return typeof value === 'number' ? value : fallback;
  }

  /** Frozen, nested merge of every layer (lowest precedence first). */
  snapshot(): ConfigMapping {
    const merged: { [key: string]: ConfigValue } = {};
    for (const name of [...LAYER_ORDER].reverse()) {
      const layer = this.layers.get(name);
      if (layer) mergeInto(merged, layer);
    }
    return deepFreeze(merged);
  }
}
