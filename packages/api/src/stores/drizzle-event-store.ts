/**
 * Drizzle-based implementation of EventStore.
 *
 * Participants live in the `event_participants` join table and are folded
 * into `participantIds` on read.
 */

import { and, count, eq, inArray } from "drizzle-orm";
import type { Db } from "../db/index.js";
import { eventParticipants, events } from "../db/schema.js";
import type {
  EventChanges,
  EventQuery,
  EventRecord,
  EventStore,
  NewEvent,
  PageResult,
} from "./types.js";

type EventRow = typeof events.$inferSelect;

export class DrizzleEventStore implements EventStore {
  constructor(private db: Db) {}

  async create(input: NewEvent): Promise<EventRecord> {
    const [row] = await this.db
      .insert(events)
      .values({
        title: input.title,
        description: input.description ?? null,
        location: input.location ?? null,
        startsAt: input.startsAt,
        endsAt: input.endsAt,
        projectId: input.projectId ?? null,
        ownerId: input.ownerId,
      })
      .returning();
    return { ...row, participantIds: [] };
  }

  async findById(id: string): Promise<EventRecord | undefined> {
    const [row] = await this.db.select().from(events).where(eq(events.id, id)).limit(1);
    if (!row) return undefined;
    const [withParticipants] = await this.attachParticipants([row]);
    return withParticipants;
  }

  async list(query: EventQuery): Promise<PageResult<EventRecord>> {
    const filter =
      query.projectId !== undefined ? eq(events.projectId, query.projectId) : undefined;

    const [rows, [totals]] = await Promise.all([
      this.db
        .select()
        .from(events)
        .where(filter)
        .orderBy(events.startsAt)
        .limit(query.limit)
        .offset(query.offset),
      this.db.select({ total: count() }).from(events).where(filter),
    ]);

    return {
      items: await this.attachParticipants(rows),
      total: totals?.total ?? 0,
    };
  }

  async update(id: string, changes: EventChanges): Promise<EventRecord | undefined> {
    const updates: Partial<typeof events.$inferInsert> = { updatedAt: new Date() };
    if (changes.title !== undefined) updates.title = changes.title;
    if (changes.description !== undefined) updates.description = changes.description;
    if (changes.location !== undefined) updates.location = changes.location;
    if (changes.startsAt !== undefined) updates.startsAt = changes.startsAt;
    if (changes.endsAt !== undefined) updates.endsAt = changes.endsAt;
    if (changes.projectId !== undefined) updates.projectId = changes.projectId;

    const [row] = await this.db
      .update(events)
      .set(updates)
      .where(eq(events.id, id))
      .returning();
    if (!row) return undefined;
    const [withParticipants] = await this.attachParticipants([row]);
    return withParticipants;
  }

  async delete(id: string): Promise<boolean> {
    const rows = await this.db
      .delete(events)
      .where(eq(events.id, id))
      .returning({ id: events.id });
    return rows.length > 0;
  }

  async addParticipant(eventId: string, userId: string): Promise<boolean> {
    const rows = await this.db
      .insert(eventParticipants)
      .values({ eventId, userId })
      .onConflictDoNothing()
      .returning({ userId: eventParticipants.userId });
    return rows.length > 0;
  }

  async removeParticipant(eventId: string, userId: string): Promise<boolean> {
    const rows = await this.db
      .delete(eventParticipants)
      .where(
        and(eq(eventParticipants.eventId, eventId), eq(eventParticipants.userId, userId)),
      )
      .returning({ userId: eventParticipants.userId });
    return rows.length > 0;
  }

  private async attachParticipants(rows: EventRow[]): Promise<EventRecord[]> {
    if (rows.length === 0) return [];

    const participants = await this.db
      .select({ eventId: eventParticipants.eventId, userId: eventParticipants.userId })
      .from(eventParticipants)
      .where(inArray(eventParticipants.eventId, rows.map((r) => r.id)))
      .orderBy(eventParticipants.joinedAt);

    const byEvent = new Map<string, string[]>();
    for (const p of participants) {
      const list = byEvent.get(p.eventId) ?? [];
      list.push(p.userId);
      byEvent.set(p.eventId, list);
    }

    return rows.map((row) => ({ ...row, participantIds: byEvent.get(row.id) ?? [] }));
  }
}
