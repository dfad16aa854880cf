// apps/backend/src/orchestrator/observability.ts
// Audit events: echoed as a JSON line, then persisted through the store.

import type { AuditEvent, FieldcraftStore } from '../db/store.js';

export type Observability = {
  logEvent(event: AuditEvent): Promise<void>;
};

export function createObservability(store: Pick<FieldcraftStore, 'auditLogs'>): Observability {
  return {
    async logEvent(event) {
      console.info(JSON.stringify({
        type: event.eventType,
        source: event.source,
        workspace_id: event.workspaceId,
        user_id: event.userId,
        details: event.details,
      }));
      await store.auditLogs.create(event);
    },
  };
}
