import { DynamicModule, Module, ModuleMetadata, Type } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import relationshipConfig from '@config/relationship.config';
import { EventsModule } from '@shared/events';

import {
  RELATIONSHIP_STORE,
  type IRelationshipStore,
} from './interfaces/relationship-store.interface';
import {
  USER_DIRECTORY,
  type IUserDirectory,
} from './interfaces/user-directory.interface';
import { RelationshipStoreClient } from './service/relationship-store.client';
import { RelationshipStateMachine } from './service/relationship-state-machine';
import { StatusResolver } from './service/status-resolver.service';
import { RelationshipGraphFacade } from './relationship-graph.facade';

export interface RelationshipModuleOptions {
  /** Concrete store bound to RELATIONSHIP_STORE */
  store: Type<IRelationshipStore>;
  /** Concrete directory bound to USER_DIRECTORY */
  directory: Type<IUserDirectory>;
  /** Modules the store or directory depend on (database, HTTP client, ...) */
  imports?: ModuleMetadata['imports'];
}

/**
 * RelationshipModule
 *
 * Responsibilities:
 * - Friend request lifecycle (send, cancel, accept, reject) and unfriend
 * - Batch status resolution with bounded concurrency
 * - Search-as-you-type sessions with stale-result suppression
 * - Domain events after every effective mutation
 *
 * Dependencies:
 * - Host-provided IRelationshipStore and IUserDirectory
 * - ConfigModule.forRoot() and EventEmitterModule.forRoot() in the host
 *   application (relationship config namespace, EventPublisher)
 *
 * Exports:
 * - RelationshipGraphFacade: the engine's public surface
 * - StatusResolver: for hosts that resolve statuses outside a search
 */
@Module({})
export class RelationshipModule {
  static register(options: RelationshipModuleOptions): DynamicModule {
    return {
      module: RelationshipModule,
      imports: [
        ConfigModule.forFeature(relationshipConfig),
        EventsModule,
        ...(options.imports ?? []),
      ],
      providers: [
        { provide: RELATIONSHIP_STORE, useClass: options.store },
        { provide: USER_DIRECTORY, useClass: options.directory },
        RelationshipStoreClient,
        RelationshipStateMachine,
        StatusResolver,
        RelationshipGraphFacade,
      ],
      exports: [RelationshipGraphFacade, StatusResolver],
    };
  }
}
