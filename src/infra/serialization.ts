import { z } from 'zod';
import type { AdapterRef, HostConfig, SeaRecord } from '../types/topology.js';

/**
 * Parsed JSON objects may arrive as `Map`s (see `parseJson`). Record shapes
 * are validated as plain objects; `properties` stays a `Map` to keep its key
 * order.
 */
function fromJsonObject(value: unknown): unknown {
  return value instanceof Map ? Object.fromEntries(value) : value;
}

function toPropertyMap(value: unknown): unknown {
  if (value instanceof Map || typeof value !== 'object' || value === null || Array.isArray(value)) {
    return value;
  }
  return new Map(Object.entries(value));
}

const jsonObject = <T extends z.ZodRawShape>(shape: T) => z.preprocess(fromJsonObject, z.object(shape));

export const SerializedAdapterSchema = jsonObject({
  adapter_name: z.string(),
  hardware_path: z.string(),
});

export const SerializedSeaSectionSchema = jsonObject({
  sea_name: z.string(),
  properties: z.preprocess(toPropertyMap, z.map(z.string(), z.string())),
  etherchannel: jsonObject({
    adapters: z.array(z.string()),
  }).nullable(),
  real_adapters: z.array(SerializedAdapterSchema),
  virtual_adapters: z.array(SerializedAdapterSchema),
});

export const SerializedHostConfigSchema = jsonObject({
  hostname: z.string().nullable(),
  sea_sections: z.array(SerializedSeaSectionSchema),
});

export const SerializedBatchSchema = z.array(SerializedHostConfigSchema);

export type SerializedAdapter = z.infer<typeof SerializedAdapterSchema>;
export type SerializedSeaSection = z.infer<typeof SerializedSeaSectionSchema>;
export type SerializedHostConfig = z.infer<typeof SerializedHostConfigSchema>;

function serializeAdapter(a: AdapterRef): SerializedAdapter {
  return {
    adapter_name: a.adapterName,
    hardware_path: a.hardwarePath,
  };
}

function deserializeAdapter(a: SerializedAdapter): AdapterRef {
  return {
    adapterName: a.adapter_name,
    hardwarePath: a.hardware_path,
  };
}

export function serializeSeaSection(s: SeaRecord): SerializedSeaSection {
  return {
    sea_name: s.seaName,
    properties: new Map(s.properties),
    etherchannel: s.etherchannel ? { adapters: [...s.etherchannel.adapters] } : null,
    real_adapters: s.realAdapters.map(serializeAdapter),
    virtual_adapters: s.virtualAdapters.map(serializeAdapter),
  };
}

export function deserializeSeaSection(s: SerializedSeaSection): SeaRecord {
  return {
    seaName: s.sea_name,
    properties: new Map(s.properties),
    etherchannel: s.etherchannel ? { adapters: [...s.etherchannel.adapters] } : null,
    realAdapters: s.real_adapters.map(deserializeAdapter),
    virtualAdapters: s.virtual_adapters.map(deserializeAdapter),
  };
}

export function serializeHostConfig(c: HostConfig): SerializedHostConfig {
  return {
    hostname: c.hostname,
    sea_sections: c.seaSections.map(serializeSeaSection),
  };
}

export function deserializeHostConfig(c: SerializedHostConfig): HostConfig {
  return {
    hostname: c.hostname,
    seaSections: c.sea_sections.map(deserializeSeaSection),
  };
}

export function serializeHostConfigs(configs: readonly HostConfig[]): SerializedHostConfig[] {
  return configs.map(serializeHostConfig);
}

/**
 * Validates an already-parsed JSON value (from `JSON.parse` or `parseJson`)
 * against the persisted batch shape.
 * Throws the zod error unchanged; callers decide how to report it.
 */
export function deserializeHostConfigs(data: unknown): HostConfig[] {
  return SerializedBatchSchema.parse(data).map(deserializeHostConfig);
}
