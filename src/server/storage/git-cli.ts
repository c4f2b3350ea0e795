/**
 * Git gateway backed by the git binary
 *
 * Repositories are bare and live under the configured repositories
 * directory. Source branches of forks are fetched into the target
 * repository so every comparison and merge runs in one object database.
 */

import { spawn } from 'child_process';
import * as path from 'path';
import type {
  BranchPair,
  CommitSummary,
  Comparison,
  DiffOptions,
  DiffRefs,
  GitGateway,
  GitProject,
  MergeCommitOptions,
} from '../../core/git-gateway';
import { compareTrees, type DiffFile, type TreeEntry } from '../../core/compare';
import { Errors } from '../../core/errors';
import { logger, type Logger } from '../logger';

export interface GitCliOptions {
  /** git executable */
  gitBin: string;
  /** Directory project disk paths are relative to */
  reposDir: string;
  /** Milliseconds before a git command is killed */
  timeout?: number;
}

interface RunOptions {
  input?: string;
  env?: Record<string, string>;
  /** Exit codes that are answers rather than failures */
  allowedExitCodes?: number[];
}

interface RunResult {
  stdout: Buffer;
  exitCode: number;
}

const FIELD = '\x1f';
const RECORD = '\x1e';

/**
 * Parse `ls-tree -r -z` output
 */
export function parseLsTree(output: Buffer): TreeEntry[] {
  const entries: TreeEntry[] = [];

  for (const record of output.toString('utf-8').split('\0')) {
    if (!record) continue;
    const tab = record.indexOf('\t');
    const [mode, , sha] = record.slice(0, tab).split(' ');
    if (!mode || !sha) continue;
    entries.push({ mode, sha, path: record.slice(tab + 1) });
  }

  return entries;
}

/**
 * Parse `log` output written with the FIELD/RECORD separators
 */
export function parseLog(output: string): CommitSummary[] {
  const commits: CommitSummary[] = [];

  for (const record of output.split(RECORD)) {
    const trimmed = record.replace(/^\n/, '');
    if (!trimmed) continue;

    const [sha = '', authorName = '', authorEmail = '', authoredAt = '', message = ''] = trimmed.split(FIELD);
    const body = message.trimEnd();
    commits.push({
      sha,
      shortSha: sha.slice(0, 8),
      title: body.split('\n')[0] ?? '',
      message: body,
      authorName,
      authorEmail,
      authoredAt: new Date(authoredAt),
    });
  }

  return commits;
}

export class CliGitGateway implements GitGateway {
  private readonly log: Logger;

  constructor(
    private readonly options: GitCliOptions,
    log: Logger = logger.child({ service: 'git' })
  ) {
    this.log = log;
  }

  private repoPath(project: GitProject): string {
    return path.resolve(this.options.reposDir, project.diskPath);
  }

  private run(project: GitProject, args: string[], runOptions: RunOptions = {}): Promise<RunResult> {
    const gitDir = this.repoPath(project);
    const { allowedExitCodes = [] } = runOptions;
    const done = this.log.time(`git ${args[0] ?? ''}`);

    return new Promise((resolve, reject) => {
      const child = spawn(this.options.gitBin, ['--git-dir', gitDir, ...args], {
        env: { ...process.env, ...runOptions.env },
        stdio: ['pipe', 'pipe', 'pipe'],
        timeout: this.options.timeout ?? 60_000,
      });

      const stdout: Buffer[] = [];
      let stderr = '';

      child.stdout.on('data', (data: Buffer) => {
        stdout.push(data);
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('error', (error) => {
        reject(Errors.gitCommandFailed(args, null, error.message));
      });

      child.on('close', (code: number | null) => {
        done();
        if (code === 0 || (code !== null && allowedExitCodes.includes(code))) {
          resolve({ stdout: Buffer.concat(stdout), exitCode: code });
        } else {
          reject(Errors.gitCommandFailed(args, code, stderr));
        }
      });

      child.stdin.end(runOptions.input ?? '');
    });
  }

  private async text(project: GitProject, args: string[], runOptions?: RunOptions): Promise<string> {
    const { stdout } = await this.run(project, args, runOptions);
    return stdout.toString('utf-8').trim();
  }

  async branchSha(project: GitProject, branch: string): Promise<string | null> {
    const { stdout, exitCode } = await this.run(
      project,
      ['rev-parse', '--verify', '--quiet', `refs/heads/${branch}^{commit}`],
      { allowedExitCodes: [1] }
    );
    return exitCode === 0 ? stdout.toString('utf-8').trim() : null;
  }

  /**
   * Head of the source branch, available in the target repository
   */
  private async sourceHead(pair: BranchPair): Promise<string> {
    const sha = await this.branchSha(pair.sourceProject, pair.sourceBranch);
    if (!sha) {
      throw Errors.branchNotFound(pair.sourceBranch, pair.sourceProject.fullPath);
    }

    if (pair.sourceProject.id !== pair.targetProject.id) {
      await this.run(pair.targetProject, [
        'fetch',
        '--no-tags',
        '--quiet',
        this.repoPath(pair.sourceProject),
        `+refs/heads/${pair.sourceBranch}:refs/sources/${pair.sourceProject.id}/${pair.sourceBranch}`,
      ]);
    }

    return sha;
  }

  async diffRefs(pair: BranchPair): Promise<DiffRefs> {
    const startSha = await this.branchSha(pair.targetProject, pair.targetBranch);
    if (!startSha) {
      throw Errors.branchNotFound(pair.targetBranch, pair.targetProject.fullPath);
    }
    const headSha = await this.sourceHead(pair);

    // Unrelated histories have no merge base; the diff then starts at the target head
    const { stdout, exitCode } = await this.run(pair.targetProject, ['merge-base', startSha, headSha], {
      allowedExitCodes: [1],
    });
    const baseSha = exitCode === 0 ? stdout.toString('utf-8').trim() : startSha;

    return { baseSha, startSha, headSha };
  }

  private async flattenTree(project: GitProject, sha: string): Promise<TreeEntry[]> {
    const { stdout } = await this.run(project, ['ls-tree', '-r', '-z', '--full-tree', sha]);
    return parseLsTree(stdout);
  }

  async diffBetween(project: GitProject, fromSha: string, toSha: string, options: DiffOptions = {}): Promise<DiffFile[]> {
    const [base, head] = await Promise.all([
      this.flattenTree(project, fromSha),
      this.flattenTree(project, toSha),
    ]);

    return compareTrees(
      base,
      head,
      async (sha) => (await this.run(project, ['cat-file', 'blob', sha])).stdout,
      options
    );
  }

  async compare(pair: BranchPair, options: DiffOptions = {}): Promise<Comparison> {
    const diffRefs = await this.diffRefs(pair);
    const diffs = await this.diffBetween(pair.targetProject, diffRefs.baseSha, diffRefs.headSha, options);
    return { diffRefs, diffs };
  }

  async commitsBetween(project: GitProject, fromSha: string, toSha: string): Promise<CommitSummary[]> {
    const output = await this.text(project, [
      'log',
      `--format=%H${FIELD}%an${FIELD}%ae${FIELD}%aI${FIELD}%B${RECORD}`,
      `${fromSha}..${toSha}`,
    ]);
    return parseLog(output);
  }

  async commits(pair: BranchPair): Promise<CommitSummary[]> {
    const refs = await this.diffRefs(pair);
    return this.commitsBetween(pair.targetProject, refs.startSha, refs.headSha);
  }

  /**
   * Tree of the merge result, or null when the branches conflict
   */
  private async mergeTree(project: GitProject, refs: DiffRefs): Promise<string | null> {
    const { stdout, exitCode } = await this.run(
      project,
      ['merge-tree', '--write-tree', '--no-messages', refs.startSha, refs.headSha],
      { allowedExitCodes: [1] }
    );
    if (exitCode !== 0) return null;
    return stdout.toString('utf-8').split('\n')[0]?.trim() ?? null;
  }

  async canMerge(pair: BranchPair): Promise<boolean> {
    const refs = await this.diffRefs(pair);
    return (await this.mergeTree(pair.targetProject, refs)) !== null;
  }

  async merge(pair: BranchPair, options: MergeCommitOptions): Promise<string> {
    const project = pair.targetProject;
    const refs = await this.diffRefs(pair);

    const tree = await this.mergeTree(project, refs);
    if (!tree) {
      throw Errors.mergeConflict(pair.sourceBranch, pair.targetBranch);
    }

    const commitSha = await this.text(project, ['commit-tree', tree, '-p', refs.startSha, '-p', refs.headSha, '-F', '-'], {
      input: options.message,
      env: {
        GIT_AUTHOR_NAME: options.authorName,
        GIT_AUTHOR_EMAIL: options.authorEmail,
        GIT_COMMITTER_NAME: options.authorName,
        GIT_COMMITTER_EMAIL: options.authorEmail,
      },
    });

    // Fails when the target branch moved since the merge started
    await this.run(project, ['update-ref', `refs/heads/${pair.targetBranch}`, commitSha, refs.startSha]);

    this.log.info('Merged branch', {
      project: project.fullPath,
      sourceBranch: pair.sourceBranch,
      targetBranch: pair.targetBranch,
      commitSha,
    });

    return commitSha;
  }

  async deleteBranch(project: GitProject, branch: string): Promise<void> {
    await this.run(project, ['update-ref', '-d', `refs/heads/${branch}`]);
  }
}
