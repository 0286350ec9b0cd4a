import { beforeEach, describe, expect, it } from '@jest/globals';
import { Services } from '../../src/container';
import { SubscriptionIndex, toSubscriptionTarget } from '../../src/services/subscriptionIndex';
import { NotFoundError, ValidationError } from '../../src/utils/errors';
import { makeServices } from '../helpers/makeApp';
import { Seeder } from '../helpers/seed';

describe('toSubscriptionTarget', () => {
  it('accepts exactly one id', () => {
    expect(toSubscriptionTarget({ publisherId: 3 })).toEqual({ type: 'publisher', id: 3 });
    expect(toSubscriptionTarget({ journalistId: 4 })).toEqual({ type: 'journalist', id: 4 });
  });

  it('rejects both or neither', () => {
    expect(() => toSubscriptionTarget({ publisherId: 1, journalistId: 2 })).toThrow(
      'Provide either publisher_id or journalist_id, not both'
    );
    expect(() => toSubscriptionTarget({})).toThrow(ValidationError);
  });
});

describe('SubscriptionIndex', () => {
  let services: Services;
  let seed: Seeder;
  const index = new SubscriptionIndex();

  beforeEach(() => {
    services = makeServices().services;
    seed = new Seeder(services);
  });

  it('subscribes idempotently', () => {
    const publisher = seed.publisher('Daily Planet');
    const reader = seed.reader('r1');
    const target = { type: 'publisher' as const, id: publisher.id };

    const first = services.store.transaction((tx) => index.subscribe(tx, reader, target));
    const second = services.store.transaction((tx) => index.subscribe(tx, reader, target));

    expect(first).toEqual({ target, name: 'Daily Planet', changed: true });
    expect(second.changed).toBe(false);
    expect(index.list(services.store, reader).publishers.map((p) => p.id)).toEqual([publisher.id]);
  });

  it('restores the previous set after subscribe then unsubscribe', () => {
    const planet = seed.publisher('Daily Planet');
    const bugle = seed.publisher('Daily Bugle');
    const journalist = seed.journalist('clark');
    const reader = seed.reader('r1');
    seed.subscribe(reader, planet);
    const before = index.list(services.store, reader);

    services.store.transaction((tx) => {
      index.subscribe(tx, reader, { type: 'publisher', id: bugle.id });
      index.subscribe(tx, reader, { type: 'journalist', id: journalist.id });
    });
    services.store.transaction((tx) => {
      index.unsubscribe(tx, reader, { type: 'publisher', id: bugle.id });
      index.unsubscribe(tx, reader, { type: 'journalist', id: journalist.id });
    });

    expect(index.list(services.store, reader)).toEqual(before);
  });

  it('treats removing an absent subscription as a no-op', () => {
    const publisher = seed.publisher('Daily Planet');
    const reader = seed.reader('r1');

    const change = services.store.transaction((tx) =>
      index.unsubscribe(tx, reader, { type: 'publisher', id: publisher.id })
    );

    expect(change.changed).toBe(false);
  });

  it('only follows users who are journalists', () => {
    const editor = seed.editor('perry');
    const reader = seed.reader('r1');

    expect(() =>
      services.store.transaction((tx) => index.subscribe(tx, reader, { type: 'journalist', id: editor.id }))
    ).toThrow(new NotFoundError('Journalist not found'));
    expect(() =>
      services.store.transaction((tx) => index.subscribe(tx, reader, { type: 'publisher', id: 99 }))
    ).toThrow('Publisher not found');
  });

  it('lists publishers by name and journalists by username', () => {
    const zeta = seed.publisher('Zeta');
    const alpha = seed.publisher('Alpha');
    const lois = seed.journalist('lois');
    const clark = seed.journalist('clark');
    const reader = seed.reader('r1');
    seed.subscribe(reader, zeta);
    seed.subscribe(reader, alpha);
    seed.follow(reader, lois);
    seed.follow(reader, clark);

    const result = index.list(services.store, reader);

    expect(result.publishers.map((p) => p.name)).toEqual(['Alpha', 'Zeta']);
    expect(result.journalists.map((j) => j.username)).toEqual(['clark', 'lois']);
  });

  it('builds the approval audience from subscribers and followers without duplicates', () => {
    const publisher = seed.publisher('Daily Planet');
    const other = seed.publisher('Daily Bugle');
    const author = seed.journalist('clark');
    const both = seed.reader('both');
    const subscriber = seed.reader('subscriber');
    const follower = seed.reader('follower');
    const outsider = seed.reader('outsider');
    seed.subscribe(both, publisher);
    seed.follow(both, author);
    seed.subscribe(subscriber, publisher);
    seed.follow(follower, author);
    seed.subscribe(outsider, other);

    const audience = index.audienceOf(services.store, author.id, publisher.id);
    const independent = index.audienceOf(services.store, author.id, null);

    expect(audience.map((r) => r.username)).toEqual(['both', 'subscriber', 'follower']);
    expect(independent.map((r) => r.username)).toEqual(['both', 'follower']);
  });
});
