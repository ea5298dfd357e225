export * from './errors';
export * from './config/RunConfig';
export * from './registry/types';
export * from './registry/ServiceRegistry';
export * from './registry/StackDetector';
export * from './registry/defaults';
export * from './supervisor/types';
export * from './supervisor/RunningService';
export * from './supervisor/ProcessSupervisor';
export * from './supervisor/PortFinder';
export * from './supervisor/DependencyCheck';
export * from './health/types';
export * from './health/HealthProbe';
export * from './health/HealthPoller';
export * from './orchestrator/ModeSelector';
export * from './orchestrator/SignalCoordinator';
export * from './orchestrator/Orchestrator';
export * from './orchestrator/HealthVerifier';
export * from './logging/ConfigurableLoggerFactory';
export * from './logging/LogContext';
