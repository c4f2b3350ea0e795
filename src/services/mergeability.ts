import { isMergeableState, type MergeRequestSnapshot } from '../core/merge-request';
import { branchPair, type ServiceDeps } from './context';

/**
 * Whether a merge request can be merged right now.
 *
 * The state rules are checked first; only then is the repository asked
 * whether the branches merge cleanly. The answer is cached on the merge
 * request as its merge status.
 */
export async function checkMergeable(
  deps: ServiceDeps,
  snapshot: MergeRequestSnapshot,
  options: { skipCiCheck?: boolean } = {}
): Promise<boolean> {
  if (!isMergeableState(snapshot, options)) return false;

  const pair = branchPair(snapshot);
  if (!pair) return false;

  const clean = await deps.git.canMerge(pair);
  const mergeStatus = clean ? 'can_be_merged' : 'cannot_be_merged';

  if (snapshot.mergeRequest.mergeStatus !== mergeStatus) {
    await deps.store.mergeRequests.update(snapshot.mergeRequest.id, { mergeStatus });
  }

  return clean;
}
