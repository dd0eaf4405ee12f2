import type { Database } from '../infrastructure/db/index.js';

/** What kind of configuration changed. Workers reload the matching snapshot. */
export type ConfigChangeKind = 'rule' | 'subject';

export type ConfigChangeReason = 'create' | 'update' | 'patch' | 'delete';

export interface ConfigChange {
  readonly kind: ConfigChangeKind;
  readonly reason: ConfigChangeReason;
  readonly id: string;
}

/** Best-effort broadcast of a change; implementations must not throw. */
export type ConfigChangeNotifier = (change: ConfigChange) => Promise<void>;

/** Collaborators of the rule and subject use cases. */
export interface ConfigDeps {
  readonly db: Database;
  readonly notify: ConfigChangeNotifier;
}
