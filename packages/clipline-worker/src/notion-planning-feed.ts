import type { PlanningFeed, PlanningWorkItem } from '@clipline/core';
import { z } from 'zod';

import type { NotionClient } from './notion-client';

const RichTextSchema = z.array(z.object({ plain_text: z.string() }));
const OptionSchema = z.object({ name: z.string() }).nullable();

const PropertySchema = z
  .object({
    title: RichTextSchema.optional(),
    rich_text: RichTextSchema.optional(),
    select: OptionSchema.optional(),
    status: OptionSchema.optional(),
  })
  .passthrough();

type Property = z.infer<typeof PropertySchema>;

const PageSchema = z.object({
  id: z.string(),
  last_edited_time: z.string(),
  properties: z.record(z.string(), PropertySchema),
});

type Page = z.infer<typeof PageSchema>;

const QueryResponseSchema = z.object({
  results: z.array(PageSchema),
  has_more: z.boolean(),
  next_cursor: z.string().nullable(),
});

export type NotionPropertyNames = {
  title: string;
  topic: string;
  storyDirection: string;
  channel: string;
  status: string;
  priority: string;
  reviewNotes: string;
};

const DEFAULT_PROPERTY_NAMES: NotionPropertyNames = {
  title: 'Title',
  topic: 'Topic',
  storyDirection: 'Story Direction',
  channel: 'Channel',
  status: 'Status',
  priority: 'Priority',
  reviewNotes: 'Review Notes',
};

const PAGE_SIZE = 100;

function plainText(property: Property | undefined): string {
  const texts = property?.title ?? property?.rich_text ?? [];

  return texts
    .map((text) => text.plain_text)
    .join('')
    .trim();
}

function optionName(property: Property | undefined): string | undefined {
  return property?.status?.name ?? property?.select?.name ?? undefined;
}

/**
 * Reads the planning database page by page and turns each row into a work item. Rows without a
 * channel or a status are not work items yet and are left out.
 */
export class NotionPlanningFeed implements PlanningFeed {
  private readonly names: NotionPropertyNames;

  constructor(
    private readonly client: NotionClient,
    private readonly databaseId: string,
    propertyNames?: Partial<NotionPropertyNames>,
  ) {
    this.names = { ...DEFAULT_PROPERTY_NAMES, ...propertyNames };
  }

  async listPendingWorkItems(): Promise<PlanningWorkItem[]> {
    const items: PlanningWorkItem[] = [];
    let cursor: string | undefined;

    do {
      const response = QueryResponseSchema.parse(
        await this.client.request('POST', `/databases/${this.databaseId}/query`, {
          page_size: PAGE_SIZE,
          ...(cursor ? { start_cursor: cursor } : {}),
        }),
      );

      for (const page of response.results) {
        const item = this.toWorkItem(page);

        if (item) {
          items.push(item);
        }
      }

      cursor = response.has_more ? (response.next_cursor ?? undefined) : undefined;
    } while (cursor);

    return items;
  }

  private toWorkItem(page: Page): PlanningWorkItem | undefined {
    const property = (name: string) => page.properties[name];
    const channelId = optionName(property(this.names.channel));
    const planningStatus = optionName(property(this.names.status));

    if (!channelId || !planningStatus) {
      return undefined;
    }

    const data: Record<string, string> = {};
    const fields = [
      ['title', this.names.title],
      ['topic', this.names.topic],
      ['storyDirection', this.names.storyDirection],
    ] as const;

    for (const [key, name] of fields) {
      const value = plainText(property(name));

      if (value) {
        data[key] = value;
      }
    }

    const rejectionReason = plainText(property(this.names.reviewNotes));

    return {
      eventId: `${page.id}@${page.last_edited_time}`,
      externalRef: page.id,
      channelId,
      planningStatus,
      priority: optionName(property(this.names.priority)),
      data,
      ...(rejectionReason ? { rejectionReason } : {}),
    };
  }
}
