export { DomainEvent } from './base';
export { EventPublisher } from './event-publisher.service';
export { EventsModule } from './events.module';
