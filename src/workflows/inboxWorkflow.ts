/**
 * Mail to Drive: store every new spreadsheet attachment of the matching
 * messages under <base folder>/<sender address>/.
 */

import { attachmentCandidates } from '../mail/messageTree.js';
import type { RunContext } from '../orchestrator/types.js';
import { reconcileAttachment } from '../reconciler/attachmentReconciler.js';
import { errorMessage, type ItemOutcome } from '../reconciler/types.js';
import type { MessageHandle } from '../stores/types.js';
import { daysBefore } from '../time.js';

export interface InboxWorkflowResult {
  emailsChecked: number;
  attachmentsFound: number;
  outcomes: ItemOutcome[];
}

export async function runInboxWorkflow(ctx: RunContext): Promise<InboxWorkflowResult> {
  const { config, collaborators, index, logger, progress } = ctx;
  const { inbox, files } = collaborators;
  const result: InboxWorkflowResult = { emailsChecked: 0, attachmentsFound: 0, outcomes: [] };

  logger.step('Mail to Drive');

  let handles: MessageHandle[];
  try {
    handles = await inbox.search({
      sender: config.gmail.sender,
      term: config.gmail.searchTerm,
      since: daysBefore(ctx.now, config.gmail.daysBack),
      limit: config.gmail.maxResults
    });
  } catch (err) {
    logger.error(`Inbox search failed: ${errorMessage(err)}`);
    ctx.recordError('workflow', 'inbox search', err);
    return result;
  }

  logger.info(`Found ${handles.length} emails with attachments`);
  if (handles.length === 0) return result;

  let baseFolderId: string;
  try {
    const parentId = config.attachments.parentFolderId;
    const base = await files.createFolder(config.attachments.folderName, parentId);
    if (base.created && parentId) index.noteFolderCreated(parentId);
    baseFolderId = base.id;
  } catch (err) {
    logger.error(`Could not prepare folder "${config.attachments.folderName}": ${errorMessage(err)}`);
    ctx.recordError('workflow', config.attachments.folderName, err);
    return result;
  }

  // One folder per sender, resolved once per run
  const senderFolders = new Map<string, string>();
  const senderFolder = async (sender: string): Promise<string> => {
    const known = senderFolders.get(sender);
    if (known) return known;
    const folder = await files.createFolder(sender, baseFolderId);
    if (folder.created) index.noteFolderCreated(baseFolderId);
    senderFolders.set(sender, folder.id);
    return folder.id;
  };

  progress.startPhase('Emails', handles.length);
  for (const handle of handles) {
    result.emailsChecked++;
    try {
      const message = await inbox.get(handle.id);
      const candidates = [...attachmentCandidates(message, (messageId, attachmentId) => inbox.getAttachment(messageId, attachmentId))];
      result.attachmentsFound += candidates.length;

      if (candidates.length > 0) {
        const folderId = await senderFolder(candidates[0].sender);
        for (const candidate of candidates) {
          const outcome = await reconcileAttachment(candidate, folderId, { index, files, logger });
          result.outcomes.push(outcome);
          if (outcome.kind === 'failed') ctx.recordError('attachment', outcome.item, outcome.error);
        }
      }
    } catch (err) {
      logger.error(`Failed to process email ${handle.id}: ${errorMessage(err)}`);
      result.outcomes.push({ kind: 'failed', item: handle.id, error: errorMessage(err) });
      ctx.recordError('email', handle.id, err);
    }
    progress.increment(handle.id);
  }
  progress.finish();

  logger.info(
    `Mail to Drive completed. Emails: ${result.emailsChecked}, attachments found: ${result.attachmentsFound}`
  );
  return result;
}
