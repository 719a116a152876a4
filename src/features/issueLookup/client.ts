/**
 * Cronus — src/features/issueLookup/client.ts
 * WHAT: HTTP adapter for the error tracker's issue search endpoint.
 * WHY: One GET per attempt; every failure mode comes back as a value so the retry loop never sees a throw.
 * FLOWS: createIssueClient(config).fetchIssues(key, signal) → FetchResult
 * DOCS:
 *  - Sentry project issues: https://docs.sentry.io/api/events/list-a-projects-issues/
 *  - AbortSignal.timeout: https://nodejs.org/api/globals.html#static-method-abortsignaltimeoutdelay
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger, redact } from "../../lib/logger.js";
import { classifyError } from "../../lib/errors.js";
import type { FetchResult, IssueClientConfig, IssueFetcher, SearchKey } from "./types.js";

/** How much of a non-200 body goes into the logs */
const ERROR_BODY_LOG_MAX = 200;

/**
 * GET {baseUrl}/projects/{org}/{project}/issues/?query=error_id:{key}
 * Slugs and key are URL-encoded; the key travels as a query value.
 */
export function buildIssueSearchUrl(config: IssueClientConfig, searchKey: SearchKey): string {
  const base = config.baseUrl.replace(/\/+$/, "");
  const org = encodeURIComponent(config.orgSlug);
  const project = encodeURIComponent(config.projectSlug);
  const url = new URL(`${base}/projects/${org}/${project}/issues/`);
  url.searchParams.set("query", `error_id:${searchKey}`);
  return url.toString();
}

/**
 * Timeout signal plus the caller's cancel signal, whichever fires first.
 * Listeners are removed by the returned cleanup so a long-lived caller signal
 * doesn't accumulate them across attempts.
 */
function combineSignals(timeoutMs: number, outer?: AbortSignal): { signal: AbortSignal; cleanup: () => void } {
  const timeout = AbortSignal.timeout(timeoutMs);
  if (!outer) {
    return { signal: timeout, cleanup: () => undefined };
  }

  const controller = new AbortController();
  const onTimeout = () => controller.abort(timeout.reason);
  const onOuter = () => controller.abort(outer.reason);

  if (outer.aborted) {
    controller.abort(outer.reason);
  } else {
    timeout.addEventListener("abort", onTimeout, { once: true });
    outer.addEventListener("abort", onOuter, { once: true });
  }

  return {
    signal: controller.signal,
    cleanup: () => {
      timeout.removeEventListener("abort", onTimeout);
      outer.removeEventListener("abort", onOuter);
    },
  };
}

export function createIssueClient(config: IssueClientConfig): IssueFetcher {
  return {
    async fetchIssues(searchKey: SearchKey, signal?: AbortSignal): Promise<FetchResult> {
      const url = buildIssueSearchUrl(config, searchKey);
      const { signal: combined, cleanup } = combineSignals(config.timeoutMs, signal);
      const startedAt = Date.now();

      try {
        const response = await fetch(url, {
          method: "GET",
          headers: {
            Authorization: `Bearer ${config.apiKey}`,
            Accept: "application/json",
          },
          signal: combined,
        });

        if (response.status !== 200) {
          const body = await response.text().catch(() => "");
          logger.warn(
            {
              evt: "issue_fetch_bad_status",
              status: response.status,
              searchKey,
              body: redact(body).slice(0, ERROR_BODY_LOG_MAX),
            },
            "[issueLookup] search endpoint returned non-200"
          );
          return { ok: false, error: { kind: "bad_status", status: response.status } };
        }

        const payload: unknown = await response.json();
        logger.debug(
          { evt: "issue_fetch_ok", searchKey, ms: Date.now() - startedAt },
          "[issueLookup] search endpoint responded"
        );
        return { ok: true, payload };
      } catch (err) {
        // Connection errors, timeouts, aborts and unparseable bodies all land here
        const classified = classifyError(err);
        const code = classified.kind === "network" ? classified.code : undefined;
        logger.warn(
          { evt: "issue_fetch_transport_error", searchKey, code, errorKind: classified.kind, err },
          "[issueLookup] search request failed"
        );
        return {
          ok: false,
          error: code ? { kind: "transport", message: classified.message, code } : { kind: "transport", message: classified.message },
        };
      } finally {
        cleanup();
      }
    },
  };
}
