/**
 * Per-run wiring
 *
 * Builds the collaborators one poll cycle needs around a fresh AuthSession:
 * the mailbox scanner (Gmail), the link resolver and the Drive object store.
 * The session, and with it the cached bearer token, lives only as long as
 * the run.
 */

import { filingConfig, DriveObjectStore, createDriveClient } from '../filing/index.js';
import { AuthSession } from '../google/index.js';
import { intakeConfig, createGmailClient, LinkResolver, MailScanner } from '../intake/index.js';
import type { RoutingRules } from '../rules.js';
import type { DedupStore } from '../store/index.js';
import type { PollCycleDeps } from './poll-cycle.js';

export function createPollDeps(dedupStore: DedupStore, rules: RoutingRules): PollCycleDeps {
  const session = AuthSession.fromEnv(intakeConfig.mailbox);

  const scanner = new MailScanner({
    gmail: createGmailClient(session),
    session,
    linkResolver: new LinkResolver(),
  });

  const objectStore = new DriveObjectStore({
    drive: createDriveClient(session),
    session,
  });

  return {
    scanner,
    dedupStore,
    pipeline: {
      objectStore,
      dedupStore,
      rules,
      route: {
        rootFolderName: filingConfig.rootFolderName,
        reviewFolderName: filingConfig.reviewFolderName,
      },
    },
  };
}
