export const ServiceState = {
  Init: 'init',
  Starting: 'starting',
  Started: 'started',
  // declared for a future graceful drain, no transition leads here yet
  Stopping: 'stopping',
  Stopped: 'stopped',
} as const;

export type ServiceState = (typeof ServiceState)[keyof typeof ServiceState];

export const serviceStates: readonly ServiceState[] = Object.values(ServiceState);

export function isServiceState(value: unknown): value is ServiceState {
  return serviceStates.some((state) => state === value);
}
