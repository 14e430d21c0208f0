export const defaultMonitorEndpoints = {
  heartbeat: 'tcp://localhost:8810',
  control: 'tcp://localhost:8820',
} as const;
