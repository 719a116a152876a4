/**
 * Cronus — src/features/issueLookup/inflight.ts
 * WHAT: Registry of running lookups keyed by their progress message id.
 * WHY: Deleting the progress message, or shutting the bot down, should stop the lookup
 *      instead of letting it keep fetching and editing a message nobody can see.
 * FLOWS:
 *  register(messageId, controller) → abortByMessageId(id) on messageDelete
 *                                  → abortAll() on shutdown
 *  release(messageId, controller) when the run finishes
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../../lib/logger.js";

export class InflightLookups {
  private readonly byMessageId = new Map<string, AbortController>();

  register(messageId: string, controller: AbortController): void {
    this.byMessageId.set(messageId, controller);
  }

  /**
   * Only removes the entry if it still belongs to this controller; message ids
   * are unique, but a stale release must never drop a newer registration.
   */
  release(messageId: string, controller: AbortController): void {
    if (this.byMessageId.get(messageId) === controller) {
      this.byMessageId.delete(messageId);
    }
  }

  /** Returns true when a running lookup was aborted */
  abortByMessageId(messageId: string, reason = "progress message deleted"): boolean {
    const controller = this.byMessageId.get(messageId);
    if (!controller) return false;
    this.byMessageId.delete(messageId);
    controller.abort(new Error(reason));
    logger.info({ evt: "issue_lookup_abort", messageId, reason }, "[issueLookup] aborted in-flight lookup");
    return true;
  }

  /** Returns how many lookups were aborted */
  abortAll(reason = "shutting down"): number {
    const controllers = [...this.byMessageId.values()];
    this.byMessageId.clear();
    for (const controller of controllers) {
      controller.abort(new Error(reason));
    }
    if (controllers.length > 0) {
      logger.info({ evt: "issue_lookup_abort_all", count: controllers.length, reason }, "[issueLookup] aborted in-flight lookups");
    }
    return controllers.length;
  }

  get size(): number {
    return this.byMessageId.size;
  }
}

/** Process-wide registry used by the /sentry command and index.ts */
export const inflightLookups = new InflightLookups();
