export * from './types';
export * from './interfaces';
export * from './errors/relationship.errors';
export * from './events/relationship.events';
export * from './service/relationship-store.client';
export * from './service/relationship-state-machine';
export * from './service/status-resolver.service';
export * from './service/search-coordinator';
export * from './relationship-graph.facade';
export * from './relationship.module';
