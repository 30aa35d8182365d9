// Main entry point for the search cluster operator

// Types
export * from './cluster/types';

// Reconciliation core
export * from './cluster/quorum/QuorumCalculator';
export * from './cluster/probe/ClusterProber';
export * from './cluster/seeding/SeedHostRegistry';
export * from './cluster/reconciliation/ClusterReconciler';

// Membership and leadership
export * from './cluster/membership/PeerMembership';
export * from './cluster/leadership/StaticLeadershipOracle';
export * from './persistence/memory/InMemorySeedStore';

// Backend client
export * from './backend/types';
export * from './backend/CircuitBreaker';
export * from './backend/ElasticsearchClient';

// Configuration
export * from './config/OperatorConfiguration';
export * from './config/NodeConfigRenderer';

// Operator loop
export * from './operator/SearchClusterOperator';

// Common modules
export * from './common/logger';
