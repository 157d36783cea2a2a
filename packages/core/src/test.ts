// Re-export everything
export * from './index';

// Test utilities (below)
export { describeDatasetCompliance, type DatasetComplianceHooks } from './test/compliance';
