import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Test, TestingModule } from '@nestjs/testing';
import relationshipConfig from '@config/relationship.config';
import { InMemoryRelationshipStore } from '../../../../test/mocks/in-memory-relationship.store';
import { testRelationshipConfig } from '../../../../test/mocks/relationship-config.mock';
import { mirrorStatus } from '../../../../test/helpers/relationship.helpers';
import { RelationshipStateMachine } from './relationship-state-machine';
import { RelationshipStoreClient } from './relationship-store.client';
import { RELATIONSHIP_STORE } from '../interfaces';
import {
  FriendRequestNotFoundException,
  InvalidTransitionException,
  SelfActionException,
  StoreUnavailableException,
} from '../errors/relationship.errors';
import { RelationshipStatuses } from '../types/relationship-status';

const alice = 'user-alice';
const bob = 'user-bob';
const none = RelationshipStatuses.none();

describe('RelationshipStateMachine', () => {
  let machine: RelationshipStateMachine;
  let store: InMemoryRelationshipStore;

  beforeEach(async () => {
    store = new InMemoryRelationshipStore();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RelationshipStateMachine,
        RelationshipStoreClient,
        { provide: RELATIONSHIP_STORE, useValue: store },
        { provide: relationshipConfig.KEY, useValue: testRelationshipConfig },
      ],
    }).compile();

    machine = module.get<RelationshipStateMachine>(RelationshipStateMachine);
  });

  async function sendFrom(from: string, to: string): Promise<string> {
    return store.createRequest(from, to);
  }

  describe('send', () => {
    it('should create a request from NONE and report the stored status', async () => {
      const outcome = await machine.send(alice, bob, none);

      expect(outcome.performed).toBe(true);
      expect(outcome.action).toBe('SEND');
      expect(outcome.requestId).toEqual(expect.any(String));
      expect(outcome.status).toEqual({
        kind: 'OUTGOING_REQUEST',
        requestId: outcome.requestId,
      });
      expect(store.statusOf(bob, alice)).toEqual(mirrorStatus(outcome.status));
    });

    it('should be idempotent on double send', async () => {
      const createSpy = vi.spyOn(store, 'createRequest');

      const first = await machine.send(alice, bob, none);
      const second = await machine.send(alice, bob, first.status);

      expect(createSpy).toHaveBeenCalledTimes(1);
      expect(second.performed).toBe(false);
      expect(second.status).toEqual(first.status);
      expect(store.requests.size).toBe(1);
    });

    it('should absorb a duplicate when the observed NONE was stale', async () => {
      const existingId = await sendFrom(alice, bob);

      const outcome = await machine.send(alice, bob, none);

      expect(outcome.performed).toBe(false);
      expect(outcome.status).toEqual(RelationshipStatuses.outgoing(existingId));
      expect(store.requests.size).toBe(1);
    });

    it('should not mutate when already friends', async () => {
      const requestId = await sendFrom(alice, bob);
      await store.acceptRequest(requestId);
      const createSpy = vi.spyOn(store, 'createRequest');

      const outcome = await machine.send(alice, bob, RelationshipStatuses.friends());

      expect(createSpy).not.toHaveBeenCalled();
      expect(outcome.status).toEqual(RelationshipStatuses.friends());
    });

    it('should refuse to auto-accept an incoming request', async () => {
      const incomingId = await sendFrom(bob, alice);
      const createSpy = vi.spyOn(store, 'createRequest');

      const error = await machine
        .send(alice, bob, RelationshipStatuses.incoming(incomingId))
        .catch((e: unknown) => e);

      if (!(error instanceof InvalidTransitionException)) {
        throw new Error('expected InvalidTransitionException');
      }
      expect(error.code).toBe('INVALID_TRANSITION');
      expect(error.hint).toBe('USE_ACCEPT');
      expect(error.requestId).toBe(incomingId);
      expect(createSpy).not.toHaveBeenCalled();
      expect(store.statusOf(alice, bob)).toEqual(
        RelationshipStatuses.incoming(incomingId),
      );
    });

    it('should raise InvalidTransition when a stale NONE hides an incoming request', async () => {
      const incomingId = await sendFrom(bob, alice);

      const error = await machine.send(alice, bob, none).catch((e: unknown) => e);

      if (!(error instanceof InvalidTransitionException)) {
        throw new Error('expected InvalidTransitionException');
      }
      expect(error.requestId).toBe(incomingId);
      expect(store.requests.size).toBe(1);
    });

    it('should throw SelfActionException without touching the store', async () => {
      const createSpy = vi.spyOn(store, 'createRequest');

      await expect(machine.send(alice, alice, none)).rejects.toThrow(
        SelfActionException,
      );
      expect(createSpy).not.toHaveBeenCalled();
    });

    it('should report the new request when the re-read after create fails', async () => {
      vi.spyOn(store, 'getStatus').mockRejectedValueOnce(new Error('offline'));

      const outcome = await machine.send(alice, bob, none);

      expect(outcome.performed).toBe(true);
      expect(outcome.confirmed).toBe(false);
      expect(outcome.requestId).toEqual(expect.any(String));
      expect(outcome.status).toEqual(
        RelationshipStatuses.outgoing(outcome.requestId ?? ''),
      );
      expect(store.statusOf(alice, bob)).toEqual(outcome.status);
    });

    it('should fail a no-op send when its re-read fails', async () => {
      await store.acceptRequest(await sendFrom(alice, bob));
      vi.spyOn(store, 'getStatus').mockRejectedValueOnce(new Error('offline'));

      await expect(
        machine.send(alice, bob, RelationshipStatuses.friends()),
      ).rejects.toThrow(StoreUnavailableException);
    });

    it('should propagate store failures as STORE_UNAVAILABLE', async () => {
      vi.spyOn(store, 'createRequest').mockRejectedValueOnce(
        new Error('connection reset'),
      );

      const error = await machine.send(alice, bob, none).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StoreUnavailableException);
      if (!(error instanceof StoreUnavailableException)) return;
      expect(error.message).toBe('Store createRequest failed: connection reset');
    });
  });

  describe('cancel', () => {
    it('should cancel an outgoing request', async () => {
      const requestId = await sendFrom(alice, bob);

      const outcome = await machine.cancel(
        alice,
        bob,
        RelationshipStatuses.outgoing(requestId),
      );

      expect(outcome).toEqual({
        action: 'CANCEL',
        status: none,
        performed: true,
        confirmed: true,
        requestId,
      });
      expect(store.requests.get(requestId)?.state).toBe('CANCELED');
    });

    it('should report FRIENDS when the other side accepted first', async () => {
      const requestId = await sendFrom(alice, bob);
      await store.acceptRequest(requestId);

      const outcome = await machine.cancel(
        alice,
        bob,
        RelationshipStatuses.outgoing(requestId),
      );

      expect(outcome.performed).toBe(false);
      expect(outcome.status).toEqual(RelationshipStatuses.friends());
      expect(store.requests.get(requestId)?.state).toBe('ACCEPTED');
    });

    it('should return the authoritative status when there is nothing to cancel', async () => {
      const cancelSpy = vi.spyOn(store, 'cancelRequest');

      const outcome = await machine.cancel(alice, bob, none);

      expect(cancelSpy).not.toHaveBeenCalled();
      expect(outcome.performed).toBe(false);
      expect(outcome.status).toEqual(none);
    });
  });

  describe('accept', () => {
    it('should accept an incoming request', async () => {
      const requestId = await sendFrom(bob, alice);

      const outcome = await machine.accept(
        alice,
        bob,
        RelationshipStatuses.incoming(requestId),
      );

      expect(outcome.performed).toBe(true);
      expect(outcome.status).toEqual(RelationshipStatuses.friends());
      expect(store.statusOf(bob, alice)).toEqual(RelationshipStatuses.friends());
    });

    it('should act on the stored request when the observed status is stale', async () => {
      const requestId = await sendFrom(bob, alice);

      const outcome = await machine.accept(alice, bob, none);

      expect(outcome.performed).toBe(true);
      expect(outcome.requestId).toBe(requestId);
      expect(outcome.status).toEqual(RelationshipStatuses.friends());
    });

    it('should report NONE when the requester cancelled before the accept landed', async () => {
      const requestId = await sendFrom(bob, alice);
      vi.spyOn(store, 'acceptRequest').mockImplementationOnce(async (id) => {
        await store.cancelRequest(id);
        throw new FriendRequestNotFoundException();
      });

      const outcome = await machine.accept(
        alice,
        bob,
        RelationshipStatuses.incoming(requestId),
      );

      expect(outcome.performed).toBe(false);
      expect(outcome.requestId).toBe(requestId);
      expect(outcome.status).toEqual(none);
    });

    it('should report FRIENDS when the re-read after accepting fails', async () => {
      const requestId = await sendFrom(bob, alice);
      const read = store.getStatus.bind(store);
      vi.spyOn(store, 'getStatus')
        .mockImplementationOnce(read)
        .mockRejectedValueOnce(new Error('offline'));

      const outcome = await machine.accept(
        alice,
        bob,
        RelationshipStatuses.incoming(requestId),
      );

      expect(outcome).toEqual({
        action: 'ACCEPT',
        status: RelationshipStatuses.friends(),
        performed: true,
        confirmed: false,
        requestId,
      });
      expect(store.statusOf(alice, bob)).toEqual(RelationshipStatuses.friends());
    });
  });

  describe('request ids from other pairs', () => {
    const carol = 'user-carol';
    const dave = 'user-dave';
    const erin = 'user-erin';

    it('should not accept a request that belongs to another pair', async () => {
      const carolRequestId = await sendFrom(carol, alice);
      const acceptSpy = vi.spyOn(store, 'acceptRequest');

      const outcome = await machine.accept(
        alice,
        bob,
        RelationshipStatuses.incoming(carolRequestId),
      );

      expect(acceptSpy).not.toHaveBeenCalled();
      expect(outcome.performed).toBe(false);
      expect(outcome.status).toEqual(none);
      expect(store.requests.get(carolRequestId)?.state).toBe('PENDING');
      expect(store.statusOf(alice, bob)).toEqual(none);
    });

    it('should not cancel a request between two other users', async () => {
      const foreignRequestId = await sendFrom(dave, erin);
      const cancelSpy = vi.spyOn(store, 'cancelRequest');

      const outcome = await machine.cancel(
        alice,
        bob,
        RelationshipStatuses.outgoing(foreignRequestId),
      );

      expect(cancelSpy).not.toHaveBeenCalled();
      expect(outcome.performed).toBe(false);
      expect(store.requests.get(foreignRequestId)?.state).toBe('PENDING');
    });

    it('should not reject a request that belongs to another pair', async () => {
      const carolRequestId = await sendFrom(carol, alice);
      const rejectSpy = vi.spyOn(store, 'rejectRequest');

      const outcome = await machine.reject(
        alice,
        bob,
        RelationshipStatuses.incoming(carolRequestId),
      );

      expect(rejectSpy).not.toHaveBeenCalled();
      expect(outcome.performed).toBe(false);
      expect(store.requests.get(carolRequestId)?.state).toBe('PENDING');
    });

    it("should act on the pair's own request instead of the observed id", async () => {
      const carolRequestId = await sendFrom(carol, alice);
      const bobRequestId = await sendFrom(bob, alice);

      const outcome = await machine.accept(
        alice,
        bob,
        RelationshipStatuses.incoming(carolRequestId),
      );

      expect(outcome.performed).toBe(true);
      expect(outcome.requestId).toBe(bobRequestId);
      expect(outcome.status).toEqual(RelationshipStatuses.friends());
      expect(store.requests.get(carolRequestId)?.state).toBe('PENDING');
    });
  });

  describe('reject', () => {
    it('should reject an incoming request', async () => {
      const requestId = await sendFrom(bob, alice);

      const outcome = await machine.reject(
        alice,
        bob,
        RelationshipStatuses.incoming(requestId),
      );

      expect(outcome.performed).toBe(true);
      expect(outcome.status).toEqual(none);
      expect(store.requests.get(requestId)?.state).toBe('REJECTED');
    });

    it('should not reject an outgoing request', async () => {
      const requestId = await sendFrom(alice, bob);
      const rejectSpy = vi.spyOn(store, 'rejectRequest');

      const outcome = await machine.reject(
        alice,
        bob,
        RelationshipStatuses.outgoing(requestId),
      );

      expect(rejectSpy).not.toHaveBeenCalled();
      expect(outcome.performed).toBe(false);
      expect(outcome.status).toEqual(RelationshipStatuses.outgoing(requestId));
    });
  });

  describe('remove', () => {
    it('should remove a friendship and be a no-op the second time', async () => {
      await store.acceptRequest(await sendFrom(alice, bob));
      const removeSpy = vi.spyOn(store, 'removeFriendship');

      const first = await machine.remove(alice, bob, RelationshipStatuses.friends());
      const second = await machine.remove(alice, bob, first.status);

      expect(first.performed).toBe(true);
      expect(first.status).toEqual(none);
      expect(second.performed).toBe(false);
      expect(second.status).toEqual(none);
      expect(removeSpy).toHaveBeenCalledTimes(1);
    });

    it('should not remove when the observed FRIENDS is stale', async () => {
      const removeSpy = vi.spyOn(store, 'removeFriendship');

      const outcome = await machine.remove(
        alice,
        bob,
        RelationshipStatuses.friends(),
      );

      expect(removeSpy).not.toHaveBeenCalled();
      expect(outcome.performed).toBe(false);
      expect(outcome.status).toEqual(none);
    });

    it('should throw SelfActionException when unfriending yourself', async () => {
      await expect(machine.remove(alice, alice, none)).rejects.toThrow(
        SelfActionException,
      );
    });
  });

  it('should issue a new request id after send, accept, remove, send', async () => {
    const sent = await machine.send(alice, bob, none);
    const accepted = await machine.accept(bob, alice, mirrorStatus(sent.status));
    const removed = await machine.remove(alice, bob, accepted.status);
    const resent = await machine.send(alice, bob, removed.status);

    expect(accepted.status).toEqual(RelationshipStatuses.friends());
    expect(removed.status).toEqual(none);
    expect(resent.performed).toBe(true);
    expect(resent.requestId).toEqual(expect.any(String));
    expect(resent.requestId).not.toBe(sent.requestId);
    expect(resent.status).toEqual(
      RelationshipStatuses.outgoing(resent.requestId ?? ''),
    );
  });
});
