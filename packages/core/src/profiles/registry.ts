/**
 * Named table groups for common troubleshooting scenarios
 */

const BASE_PROFILES = {
  podLogs: ['ContainerLogV2', 'ContainerLog', 'KubeEvents', 'KubeMonAgentEvents', 'Syslog'],
  inventory: [
    'KubePodInventory',
    'KubeNodeInventory',
    'KubeServices',
    'KubePVInventory',
    'ContainerInventory',
    'ContainerImageInventory',
    'ContainerNodeInventory',
    'KubeHealth',
  ],
  metrics: ['InsightsMetrics', 'Perf', 'Heartbeat'],
  audit: ['AKSControlPlane', 'AKSAudit', 'AKSAuditAdmin'],
} as const satisfies Record<string, readonly string[]>;

export const DEFAULT_PROFILE = 'aks-debug';

/**
 * Order-preserving de-duplication
 */
export function dedupe<T>(values: Iterable<T>): T[] {
  return [...new Set(values)];
}

export const PROFILE_REGISTRY: ReadonlyMap<string, readonly string[]> = new Map<
  string,
  readonly string[]
>([
  ...Object.entries(BASE_PROFILES),
  [
    DEFAULT_PROFILE,
    dedupe([...BASE_PROFILES.podLogs, ...BASE_PROFILES.inventory, ...BASE_PROFILES.metrics]),
  ],
]);

export function getProfileTables(name: string): readonly string[] | undefined {
  return PROFILE_REGISTRY.get(name);
}

export function getDefaultProfiles(): readonly string[] {
  return PROFILE_REGISTRY.get(DEFAULT_PROFILE) ?? [];
}

export function listProfiles(): Array<{ name: string; tables: readonly string[] }> {
  return [...PROFILE_REGISTRY.entries()].map(([name, tables]) => ({ name, tables }));
}
