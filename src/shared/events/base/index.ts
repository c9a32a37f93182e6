export { DomainEvent } from './domain-event';
