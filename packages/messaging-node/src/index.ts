export { defaultMonitorEndpoints } from './endpoints.js';
export { createZmqPublisher } from './pubsub/publisher.js';
export type { ZmqPublisher } from './pubsub/publisher.js';
export { createZmqSubscriber } from './pubsub/subscriber.js';
export type { ZmqSubscriber } from './pubsub/subscriber.js';
export { createZmqRequestClient } from './reqrep/requestClient.js';
export type { ZmqRequestClient } from './reqrep/requestClient.js';
