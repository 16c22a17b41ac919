export { MemoryMonitor } from './memory-monitor.js';
export type { MemorySnapshot } from './memory-monitor.js';
