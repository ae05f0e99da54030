import type {
  ConflictChoice,
  ConflictDecision,
  LocalFile,
  RemoteDocument,
} from '@/types/documents';
import { classify } from './format-policy';
import { createLogger } from './logger';

const logger = createLogger('conflict-resolver');

export interface ConflictPolicyFlags {
  addAll: boolean;
  skipAll: boolean;
  replaceAll: boolean;
}

/**
 * Session-wide "apply to all" answers. A flag can be switched on but never off,
 * so one instance lives for exactly one upload run.
 */
export class ConflictPolicyState {
  private flags: ConflictPolicyFlags;

  constructor(initial: Partial<ConflictPolicyFlags> = {}) {
    this.flags = {
      addAll: initial.addAll ?? false,
      skipAll: initial.skipAll ?? false,
      replaceAll: initial.replaceAll ?? false,
    };
  }

  get addAll(): boolean {
    return this.flags.addAll;
  }

  get skipAll(): boolean {
    return this.flags.skipAll;
  }

  get replaceAll(): boolean {
    return this.flags.replaceAll;
  }

  enable(flag: keyof ConflictPolicyFlags): void {
    if (!this.flags[flag]) {
      logger.debug('Conflict policy flag enabled', { flag });
    }
    this.flags[flag] = true;
  }

  snapshot(): Readonly<ConflictPolicyFlags> {
    return { ...this.flags };
  }
}

/**
 * Supplies an answer when a file collides with an existing remote document
 * and no sticky flag applies
 */
export interface DecisionProvider {
  choose(file: LocalFile, existing: RemoteDocument): Promise<ConflictChoice>;
}

/**
 * Answers from a fixed script, in order; the last answer repeats
 */
export class PresetDecisionProvider implements DecisionProvider {
  private index = 0;
  readonly asked: Array<{ file: LocalFile; existing: RemoteDocument }> = [];

  constructor(private readonly answers: ConflictChoice[]) {
    if (answers.length === 0) {
      throw new Error('PresetDecisionProvider needs at least one answer');
    }
  }

  async choose(file: LocalFile, existing: RemoteDocument): Promise<ConflictChoice> {
    this.asked.push({ file, existing });
    const answer = this.answers[Math.min(this.index, this.answers.length - 1)];
    this.index++;
    return answer;
  }
}

export type ConflictResolution =
  | { decision: 'add'; existing?: RemoteDocument }
  | { decision: 'skip' | 'replace'; existing: RemoteDocument };

/**
 * First remote document with the same title (extension stripped) and category
 */
export function findMatchingDocument(
  file: LocalFile,
  remoteSiblings: RemoteDocument[]
): RemoteDocument | undefined {
  const category = classify(file);
  return remoteSiblings.find(
    document => document.title === file.baseName && document.type === category
  );
}

function applyChoice(choice: ConflictChoice, state: ConflictPolicyState): ConflictDecision {
  switch (choice) {
    case 'add':
    case 'skip':
    case 'replace':
      return choice;
    case 'add-all':
      state.enable('addAll');
      return 'add';
    case 'skip-all':
      state.enable('skipAll');
      return 'skip';
    case 'replace-all':
      state.enable('replaceAll');
      return 'replace';
  }
}

/**
 * Decide what to do with `file` given what already sits in the target folder.
 * Sticky flags are consulted in the order add-all, skip-all, replace-all; the
 * provider is only asked when none of them is set.
 */
export async function resolveConflict(
  file: LocalFile,
  remoteSiblings: RemoteDocument[],
  state: ConflictPolicyState,
  provider: DecisionProvider
): Promise<ConflictResolution> {
  const existing = findMatchingDocument(file, remoteSiblings);

  if (!existing) {
    return { decision: 'add' };
  }

  if (state.addAll) {
    // Leaves the existing document in place; the upload creates a second copy
    return { decision: 'add', existing };
  }
  if (state.skipAll) {
    return { decision: 'skip', existing };
  }
  if (state.replaceAll) {
    return { decision: 'replace', existing };
  }

  const choice = await provider.choose(file, existing);
  const decision = applyChoice(choice, state);

  logger.debug('Conflict resolved interactively', {
    file: file.path,
    existingId: existing.id,
    choice,
  });

  return { decision, existing };
}
