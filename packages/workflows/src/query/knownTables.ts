/**
 * Tables offered to the query generator when the caller names none
 */
export const ASSISTED_QUERY_TABLES: readonly string[] = [
  'ContainerLogV2',
  'ContainerLog',
  'KubeEvents',
  'KubePodInventory',
  'KubeNodeInventory',
  'KubeServices',
  'KubePVInventory',
  'ContainerInventory',
  'ContainerImageInventory',
  'ContainerNodeInventory',
  'KubeHealth',
  'InsightsMetrics',
  'Perf',
  'Heartbeat',
  'AKSControlPlane',
  'AKSAudit',
  'AKSAuditAdmin',
  'KubeMonAgentEvents',
  'Syslog',
];

/**
 * Leading tokens accepted by the client-side check besides a table name
 */
export const QUERY_LEADING_KEYWORDS: readonly string[] = ['let ', 'with ', 'union', 'print', 'datatable'];
