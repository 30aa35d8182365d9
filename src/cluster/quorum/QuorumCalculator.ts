/**
 * Majority quorum for a group of master-eligible members.
 *
 * Groups of one or two members get a quorum of 1 so a lone survivor can still
 * elect itself. Above two members the quorum is a strict majority.
 */
export function idealQuorum(totalMembers: number): number {
  if (!Number.isInteger(totalMembers) || totalMembers < 1) {
    throw new Error(`Member count must be a positive integer, got ${totalMembers}`);
  }

  if (totalMembers <= 2) {
    return 1;
  }

  return Math.floor(totalMembers / 2) + 1;
}

/**
 * Number of members that can fail while the remaining ones still reach quorum
 */
export function toleratedFailures(totalMembers: number): number {
  return totalMembers - idealQuorum(totalMembers);
}
