import 'reflect-metadata';

export * from './modules/relationship';
export { default as relationshipConfig } from './config/relationship.config';
export type { RelationshipEngineConfig } from './config/relationship.config';
export { DomainEvent, EventPublisher, EventsModule } from './shared/events';
