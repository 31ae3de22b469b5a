export { StreamPumper, type StreamPumperOptions } from './StreamPumper.js';
export { PumpStreamHandler, type PumpStreamHandlerOptions } from './PumpStreamHandler.js';
export {
  LineCollector,
  type LineCollectorOptions,
  type LineListener,
} from './LineCollector.js';
