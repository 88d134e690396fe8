import type { AdapterRef, HostConfig, SeaRecord } from '../types/topology.js';

const TITLE = 'NETWORK CONFIGURATION DIAGRAM';
const UNKNOWN_HOST = 'Unknown';

/**
 * Hardware path → adapter names, in first-seen order. Adapters sharing a
 * path sit on the same physical card and are drawn as one box.
 */
export function groupAdaptersByHardwarePath(adapters: readonly AdapterRef[]): Map<string, string[]> {
  const groups = new Map<string, string[]>();
  for (const adapter of adapters) {
    const names = groups.get(adapter.hardwarePath);
    if (names) {
      names.push(adapter.adapterName);
    } else {
      groups.set(adapter.hardwarePath, [adapter.adapterName]);
    }
  }
  return groups;
}

function renderAdapterList(label: string, adapters: readonly AdapterRef[]): string[] {
  if (adapters.length === 0) return [];
  const rows = [...groupAdaptersByHardwarePath(adapters)].map(
    ([hardwarePath, names]) => `      ├── ${names.join(', ')} (${hardwarePath})`
  );
  return [`  └── ${label}:`, ...rows];
}

function renderSea(sea: SeaRecord, position: number): string[] {
  const lines = [`SEA ${position}: ${sea.seaName}`];

  if (sea.etherchannel && sea.etherchannel.adapters.length > 0) {
    lines.push(`  └── ETHERCHANNEL: ${sea.etherchannel.adapters.join(', ')}`);
  }
  lines.push(...renderAdapterList('REAL ADAPTERS', sea.realAdapters));
  lines.push(...renderAdapterList('VIRTUAL ADAPTERS', sea.virtualAdapters));
  lines.push('');

  return lines;
}

export function renderTextDiagram(configs: readonly HostConfig[]): string {
  const lines = [TITLE, '='.repeat(50), ''];

  for (const config of configs) {
    lines.push(`HOSTNAME: ${config.hostname ?? UNKNOWN_HOST}`, '-'.repeat(30), '');
    config.seaSections.forEach((sea, i) => {
      lines.push(...renderSea(sea, i + 1));
    });
  }

  return lines.join('\n') + '\n';
}
