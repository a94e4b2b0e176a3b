import { FakeSession } from '../testing/fakes';
import { UserChannelRegistry } from './user-channel.registry';

describe('UserChannelRegistry', () => {
  let registry: UserChannelRegistry;

  beforeEach(() => {
    registry = new UserChannelRegistry();
  });

  it('reports first attach and last detach', () => {
    expect(registry.attach('u1', new FakeSession('s1'))).toBe(true);
    expect(registry.attach('u1', new FakeSession('s2'))).toBe(false);

    expect(registry.detach('u1', 's1')).toBe(false);
    expect(registry.isConnected('u1')).toBe(true);
    expect(registry.detach('u1', 's2')).toBe(true);
    expect(registry.isConnected('u1')).toBe(false);
    expect(registry.connectedUserIds()).toEqual([]);
  });

  it('ignores a detach for an unknown session', () => {
    registry.attach('u1', new FakeSession('s1'));
    expect(registry.detach('u1', 'nope')).toBe(false);
    expect(registry.detach('u2', 's1')).toBe(false);
    expect(registry.sessionsOf('u1')).toHaveLength(1);
  });

  it('delivers to every session of the user', () => {
    const a = new FakeSession('s1');
    const b = new FakeSession('s2');
    registry.attach('u1', a);
    registry.attach('u1', b);

    expect(registry.deliver('u1', 'ping', { n: 1 })).toBe(2);
    expect(a.payloadsOf('ping')).toEqual([{ n: 1 }]);
    expect(b.payloadsOf('ping')).toEqual([{ n: 1 }]);
  });

  it('drops silently for a user without sessions', () => {
    expect(registry.deliver('ghost', 'ping', {})).toBe(0);
  });

  it('keeps delivering when one session throws', () => {
    const broken = new FakeSession('s1', true);
    const healthy = new FakeSession('s2');
    registry.attach('u1', broken);
    registry.attach('u1', healthy);

    expect(registry.deliver('u1', 'ping', {})).toBe(1);
    expect(healthy.received).toHaveLength(1);
  });

  it('broadcasts to everyone, optionally sparing one user', () => {
    const s1 = new FakeSession('s1');
    const s2 = new FakeSession('s2');
    registry.attach('u1', s1);
    registry.attach('u2', s2);

    expect(registry.broadcast('hello', { x: 1 })).toBe(2);
    expect(registry.broadcast('hello', { x: 2 }, { exceptUserId: 'u1' })).toBe(1);
    expect(s1.payloadsOf('hello')).toEqual([{ x: 1 }]);
    expect(s2.payloadsOf('hello')).toEqual([{ x: 1 }, { x: 2 }]);
  });
});
