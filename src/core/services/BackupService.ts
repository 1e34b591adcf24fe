import type { DocId } from '../entities/Document.js';
import logger from '../utils/logger.js';
import type { DocumentService } from './DocumentService.js';

/** Suffixes left behind by manual edits and by `fix --backup` */
export const BACKUP_PATTERNS = ['**/*.bk', '**/*.bak', '**/*.original'];

export interface CleanResult {
  removed: DocId[];
  dryRun: boolean;
}

export class BackupService {
  constructor(private readonly documents: DocumentService) {}

  async listBackups(): Promise<DocId[]> {
    return this.documents.listFiles(BACKUP_PATTERNS);
  }

  /**
   * Delete every backup file under the root
   */
  async cleanBackups(options: { dryRun?: boolean } = {}): Promise<CleanResult> {
    const dryRun = options.dryRun ?? false;
    const backups = await this.listBackups();

    if (!dryRun) {
      for (const id of backups) {
        await this.documents.store.remove(id);
        logger.debug(`Removed ${id}`);
      }
    }

    logger.info(`${dryRun ? 'Would remove' : 'Removed'} ${backups.length} backup file(s)`);
    return { removed: backups, dryRun };
  }
}
