import { DocumentStore } from '../../connections/db/document-store';
import { DatabaseConfig } from '../../connections/config/app.config';
import { errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logging';

export interface DatabaseDiagnostics {
  backend: string;
  database: string;
  database_url: string | null;
  database_name: string | null;
  connection_status: string;
  collections: string[];
}

const MAX_LISTED_COLLECTIONS = 10;
const MAX_ERROR_LENGTH = 50;

/**
 * Reports liveness and store connectivity. Never throws: every failure is
 * described in the `database` field.
 */
export class HealthService {
  constructor(
    private readonly store: DocumentStore,
    private readonly config: Pick<DatabaseConfig, 'url' | 'name'>
  ) {}

  async getDiagnostics(): Promise<DatabaseDiagnostics> {
    const response: DatabaseDiagnostics = {
      backend: '✅ Running',
      database: '❌ Not Available',
      database_url: null,
      database_name: null,
      connection_status: 'Not Connected',
      collections: [],
    };

    try {
      if (!this.store.isConfigured()) {
        return response;
      }

      response.database = '✅ Available';
      response.database_url = this.config.url ? '✅ Set' : '❌ Not Set';
      response.database_name = this.config.name ? this.config.name : '❌ Not Set';

      if (!this.store.isConnected()) {
        response.database = '⚠️  Available but not initialized';
        return response;
      }

      try {
        const collections = await this.store.listCollections();
        response.collections = collections.slice(0, MAX_LISTED_COLLECTIONS);
        response.database = '✅ Connected & Working';
        response.connection_status = 'Connected';
      } catch (error) {
        logger.warn('Collection listing failed', { error: errorMessage(error) });
        response.database = `⚠️  Connected but Error: ${errorMessage(error).slice(0, MAX_ERROR_LENGTH)}`;
      }
    } catch (error) {
      logger.warn('Database diagnostics failed', { error: errorMessage(error) });
      response.database = `❌ Error: ${errorMessage(error).slice(0, MAX_ERROR_LENGTH)}`;
    }

    return response;
  }
}
