import type { StatusMirror } from '@clipline/core';

import type { NotionClient } from './notion-client';

/**
 * Writes the planning status onto the work item's Notion page.
 */
export class NotionStatusMirror implements StatusMirror {
  constructor(
    private readonly client: NotionClient,
    private readonly statusProperty = 'Status',
  ) {}

  async setStatus(externalRef: string, planningStatus: string): Promise<void> {
    await this.client.request('PATCH', `/pages/${externalRef}`, {
      properties: { [this.statusProperty]: { status: { name: planningStatus } } },
    });
  }
}
