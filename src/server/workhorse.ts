/**
 * Send-data headers for the front proxy.
 *
 * Large git payloads (raw diffs and patches) are not produced by the app:
 * the response carries an instruction the proxy executes against the
 * repository on disk.
 */

export const SEND_DATA_HEADER = 'Workhorse-Send-Data';

export interface SendGitDiffParams {
  RepoPath: string;
  ShaFrom: string;
  ShaTo: string;
}

function encode(params: SendGitDiffParams): string {
  return Buffer.from(JSON.stringify(params)).toString('base64url');
}

/**
 * Header for a raw diff between two commits
 */
export function sendGitDiff(params: SendGitDiffParams): [string, string] {
  return [SEND_DATA_HEADER, `git-diff:${encode(params)}`];
}

/**
 * Header for a mailbox formatted series of patches between two commits
 */
export function sendGitPatch(params: SendGitDiffParams): [string, string] {
  return [SEND_DATA_HEADER, `git-format-patch:${encode(params)}`];
}

/**
 * Read back a send-data header value
 */
export function decodeSendData(value: string): { command: string; params: unknown } {
  const separator = value.indexOf(':');
  const command = value.slice(0, separator);
  const payload = value.slice(separator + 1);
  return { command, params: JSON.parse(Buffer.from(payload, 'base64url').toString('utf8')) };
}
