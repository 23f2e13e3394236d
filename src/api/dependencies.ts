/**
 * Collaborators the HTTP layer is built from.
 * The API entry point wires real stores; tests pass in-process fakes.
 */
import type { CredentialLookup } from "../credentials/credential.loader";
import type { HealthReport } from "../monitoring/health.checker";
import type { MetricsCollector } from "../monitoring/metrics.collector";
import type { DocumentPersistenceEngine } from "../persistence/documents/document.engine";
import type { QueueClient } from "../queue/queue.client";

export interface ApiDependencies {
  queue: QueueClient;
  engine: DocumentPersistenceEngine;
  credentials: CredentialLookup;
  health: () => Promise<HealthReport>;
  metrics: MetricsCollector;
  queueName: string;
  serviceSecret: string;
}
