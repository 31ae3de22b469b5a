export {
  ExecutorFactory,
  createExecutor,
  type ExecutorFactoryDependencies,
} from './ExecutorFactory.js';
