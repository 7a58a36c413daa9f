export * from './pipeline-errors';
