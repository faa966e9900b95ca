import { computeStoredFileKey, spreadsheetMimeType } from '../identity/fileNames.js';
import type { ExistingStateIndex } from '../index/existingStateIndex.js';
import type { Logger } from '../logger.js';
import type { FileStore } from '../stores/types.js';
import type { AttachmentCandidate } from '../types.js';
import { errorMessage, type ItemOutcome } from './types.js';

export interface AttachmentReconcilerDeps {
  index: ExistingStateIndex;
  files: FileStore;
  logger: Logger;
}

/**
 * Store one attachment in `folderId` unless its stored name is already there.
 * The duplicate check runs before the attachment content is fetched.
 */
export async function reconcileAttachment(
  candidate: AttachmentCandidate,
  folderId: string,
  deps: AttachmentReconcilerDeps
): Promise<ItemOutcome> {
  const { index, files, logger } = deps;
  const storedName = computeStoredFileKey(candidate.messageId, candidate.rawFilename);

  if (await index.hasStoredName(folderId, storedName)) {
    logger.info(`[SKIP] ${storedName} already exists in folder ${folderId}`);
    return { kind: 'skipped', item: storedName, reason: 'already-stored' };
  }

  try {
    const content = await candidate.loadContent();
    await files.upload(folderId, storedName, content, spreadsheetMimeType(candidate.rawFilename));
    index.recordStoredName(folderId, storedName);
    logger.info(`[SAVED] ${storedName}`);
    return { kind: 'accepted', item: storedName };
  } catch (err) {
    const message = errorMessage(err);
    logger.error(`Failed to save attachment ${storedName}: ${message}`);
    return { kind: 'failed', item: storedName, error: message };
  }
}
