import { FOLDER_TYPE, type RemoteFolderHandle } from '@/types/documents';
import type { DocumentStore } from './document-store';
import { createLogger } from './logger';

const logger = createLogger('remote-namespace');

export function findFolderByTitle(
  title: string,
  folders: RemoteFolderHandle[]
): RemoteFolderHandle | undefined {
  return folders.find(folder => folder.title === title && folder.type === FOLDER_TYPE);
}

/**
 * Translates slash-separated folder paths into remote folder handles,
 * creating missing folders on the way. `null` stands for the root namespace.
 */
export class RemoteNamespaceResolver {
  constructor(private readonly store: DocumentStore) {}

  /**
   * Sub-folders of `parent`; a failed listing is logged and treated as empty
   */
  async listSubFolders(parent: RemoteFolderHandle | null): Promise<RemoteFolderHandle[]> {
    try {
      return await this.store.listFoldersAt(parent);
    } catch (error) {
      logger.error('Failed to list remote folders', error, {
        parentId: parent?.id ?? 'root',
      });
      return [];
    }
  }

  /**
   * Find `name` among `siblings` or create it under `parent`.
   * Returns null when the folder had to be created and creation failed.
   */
  async findOrCreateFolder(
    name: string,
    parent: RemoteFolderHandle | null,
    siblings: RemoteFolderHandle[]
  ): Promise<RemoteFolderHandle | null> {
    const existing = findFolderByTitle(name, siblings);
    if (existing) {
      return existing;
    }

    try {
      const created = await this.store.createFolder(name, parent);
      logger.debug('Created remote folder', {
        name,
        id: created.id,
        parentId: parent?.id ?? 'root',
      });
      return created;
    } catch (error) {
      logger.error('Failed to create remote folder', error, {
        name,
        parentId: parent?.id ?? 'root',
      });
      return null;
    }
  }

  /**
   * Resolve a path such as `Archive/2009/Reports`.
   * Empty segments are ignored; an empty path is the root. A segment that
   * cannot be created leaves the root as the parent of the next one.
   */
  async resolveFolderPath(folderPath?: string | null): Promise<RemoteFolderHandle | null> {
    if (!folderPath) {
      return null;
    }

    const segments = folderPath.split('/').filter(segment => segment.length > 0);
    let parent: RemoteFolderHandle | null = null;

    for (const segment of segments) {
      const siblings = await this.listSubFolders(parent);
      const folder = await this.findOrCreateFolder(segment, parent, siblings);

      if (!folder) {
        logger.warn('Continuing remote folder path from the root', {
          path: folderPath,
          failedSegment: segment,
        });
      }

      parent = folder;
    }

    return parent;
  }
}
