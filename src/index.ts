// Main entry point for the distributed system simulator

// Types
export * from './types';

// State
export * from './state/ReadWriteLock';
export * from './state/NodeStore';

// Background simulation
export * from './simulation/UpdateLoop';

// HTTP surface
export * from './transport/SimulatorHTTPServer';

// Runtime
export * from './common/Simulator';
export * from './common/logger';
export * from './common/utils';

// Configuration
export * from './config/YamlSimulatorConfiguration';
