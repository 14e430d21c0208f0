export { httpServerMetrics } from './components/httpServer.js';
export { workerServiceMetrics } from './components/workerService.js';
