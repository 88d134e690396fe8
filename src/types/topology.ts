export interface AdapterRef {
  readonly adapterName: string;
  readonly hardwarePath: string;
}

export interface EtherchannelGroup {
  readonly adapters: readonly string[];
}

export interface SeaRecord {
  readonly seaName: string;
  /** Insertion ordered; a repeated key keeps its first position and takes the last value. */
  readonly properties: ReadonlyMap<string, string>;
  readonly etherchannel: EtherchannelGroup | null;
  readonly realAdapters: readonly AdapterRef[];
  readonly virtualAdapters: readonly AdapterRef[];
}

export interface HostConfig {
  readonly hostname: string | null;
  readonly seaSections: readonly SeaRecord[];
}

/**
 * Result of one cursor-passing parse step: the parsed fragment and the index
 * of the first line the step did not consume.
 */
export interface Section<T> {
  readonly value: T;
  readonly next: number;
}

/**
 * How far marker searches and sub-section parsers may look past the
 * properties block of a SEA.
 *  - `block`: up to the next `SEA :` header
 *  - `file`: up to the end of input, so a marker belonging to a later SEA can
 *    be attached to the current one
 */
export type SectionScope = 'block' | 'file';

export interface ParseOptions {
  sectionScope?: SectionScope | undefined;
}
