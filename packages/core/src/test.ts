// Re-export everything
export * from './index';

// Test utilities (below)
export * from './test/fixtures';
