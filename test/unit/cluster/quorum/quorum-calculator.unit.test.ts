import { idealQuorum, toleratedFailures } from '../../../../src/cluster/quorum/QuorumCalculator';

describe('idealQuorum', () => {
  it('should keep a quorum of one for one and two members', () => {
    expect(idealQuorum(1)).toBe(1);
    expect(idealQuorum(2)).toBe(1);
  });

  it('should require a strict majority above two members', () => {
    expect(idealQuorum(3)).toBe(2);
    expect(idealQuorum(4)).toBe(3);
    expect(idealQuorum(5)).toBe(3);
    expect(idealQuorum(6)).toBe(4);
    expect(idealQuorum(7)).toBe(4);
  });

  it('should never exceed the member count and never decrease', () => {
    let previous = 0;
    for (let members = 1; members <= 100; members++) {
      const quorum = idealQuorum(members);
      expect(quorum).toBeLessThanOrEqual(members);
      expect(quorum).toBeGreaterThanOrEqual(previous);
      previous = quorum;
    }
  });

  it('should reject member counts that are not positive integers', () => {
    expect(() => idealQuorum(0)).toThrow('Member count must be a positive integer, got 0');
    expect(() => idealQuorum(-3)).toThrow('Member count must be a positive integer');
    expect(() => idealQuorum(2.5)).toThrow('Member count must be a positive integer');
  });
});

describe('toleratedFailures', () => {
  it('should report how many members can be lost', () => {
    expect(toleratedFailures(1)).toBe(0);
    expect(toleratedFailures(3)).toBe(1);
    expect(toleratedFailures(5)).toBe(2);
    expect(toleratedFailures(6)).toBe(2);
  });
});
