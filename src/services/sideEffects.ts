import { Role, hasRole } from '../models/User';
import { StoreReader } from '../storage/DataStore';
import { AccountEmailTask, NotifyTask, SocialPostTask, TaskHandlers } from './asyncTaskQueue';
import { FileStorageService } from './fileStorage';
import { DeliveryError, Notifier } from './notifier';
import { SocialMedia, SocialPoster } from './socialPoster';

export interface SideEffectDeps {
  store: StoreReader;
  notifier: Notifier;
  socialPoster: SocialPoster;
  fileStorage: FileStorageService;
}

const deliver = async (notifier: Notifier, task: NotifyTask | AccountEmailTask): Promise<void> => {
  const { recipients, subject, body, reference } = task.payload;
  try {
    await notifier.notify({ recipients, subject, body, reference });
  } catch (error) {
    // Retry only the addresses that failed.
    if (error instanceof DeliveryError) {
      task.payload.recipients = error.failedRecipients;
    }
    throw error;
  }
};

export const createSideEffectHandlers = (deps: SideEffectDeps): TaskHandlers => ({
  notifySubscribers: (task: NotifyTask) => deliver(deps.notifier, task),

  sendAccountEmail: (task: AccountEmailTask) => deliver(deps.notifier, task),

  async postToSocial(task: SocialPostTask): Promise<void> {
    const { editorId, text, imageId } = task.payload;

    // The connection is read at send time so a revoked token is never used.
    const editor = deps.store.getUser(editorId);
    if (!editor || !hasRole(editor, Role.EDITOR) || !editor.socialConnection) {
      console.warn(`⚠️  Skipping social post for ${task.payload.contentKind} ${task.payload.contentId}: editor is not connected`);
      return;
    }

    let media: SocialMedia | undefined;
    if (imageId) {
      const file = deps.fileStorage.getFile(imageId);
      if (file) {
        media = {
          buffer: file.buffer,
          mimeType: file.metadata.mimeType,
          fileName: file.metadata.originalName
        };
      }
    }

    const { handle, accessToken } = editor.socialConnection;
    const result = await deps.socialPoster.post({ handle, accessToken }, text, media);
    if (!result.success) {
      throw new Error(`Social post failed: ${result.error}`);
    }
  }
});
