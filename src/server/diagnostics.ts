import { describeError } from "../catalog/types";
import { DocumentStore } from "./store";

/** Body of `GET /test`. Every field is display text for a human checking a deployment. */
export interface DiagnosticsReport {
  backend: string;
  database: string;
  database_url: string;
  database_name: string;
  connection_status: string;
  collections: string[];
}

export interface DiagnosticsEnv {
  databaseUrl?: string;
  databaseName?: string;
}

const MAX_COLLECTIONS = 10;
const MAX_ERROR_LENGTH = 50;

function truncate(message: string): string {
  return message.slice(0, MAX_ERROR_LENGTH);
}

/**
 * Probes the store and reports what it finds. Never rejects: each failure becomes a status string.
 * `database_url` / `database_name` only say whether the variables are set, never their values.
 */
export async function runDiagnostics(store: DocumentStore, env: DiagnosticsEnv): Promise<DiagnosticsReport> {
  const report: DiagnosticsReport = {
    backend: "✅ Running",
    database: "❌ Not Available",
    database_url: env.databaseUrl ? "✅ Set" : "❌ Not Set",
    database_name: env.databaseName ? "✅ Set" : "❌ Not Set",
    connection_status: "Not Connected",
    collections: []
  };

  try {
    const status = store.status();
    if (!status.connected) {
      report.database = "⚠️  Available but not initialized";
      return report;
    }
    report.database = "✅ Available";
    report.connection_status = "Connected";
    try {
      const names = await store.listCollectionNames();
      report.collections = names.slice(0, MAX_COLLECTIONS);
      report.database = "✅ Connected & Working";
    } catch (err) {
      report.database = `⚠️  Connected but Error: ${truncate(describeError(err))}`;
    }
  } catch (err) {
    report.database = `❌ Error: ${truncate(describeError(err))}`;
  }
  return report;
}
