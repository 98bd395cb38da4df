import { count, eq } from "drizzle-orm";
import type { Db } from "../db/index.js";
import { projects } from "../db/schema.js";
import type {
  NewProject,
  PageRequest,
  PageResult,
  ProjectChanges,
  ProjectRecord,
  ProjectStore,
} from "./types.js";

export class DrizzleProjectStore implements ProjectStore {
  constructor(private db: Db) {}

  async create(input: NewProject): Promise<ProjectRecord> {
    const [row] = await this.db
      .insert(projects)
      .values({
        name: input.name,
        description: input.description ?? null,
        ownerId: input.ownerId,
      })
      .returning();
    return row;
  }

  async findById(id: string): Promise<ProjectRecord | undefined> {
    const [row] = await this.db
      .select()
      .from(projects)
      .where(eq(projects.id, id))
      .limit(1);
    return row;
  }

  async list(page: PageRequest): Promise<PageResult<ProjectRecord>> {
    const [items, [totals]] = await Promise.all([
      this.db
        .select()
        .from(projects)
        .orderBy(projects.createdAt)
        .limit(page.limit)
        .offset(page.offset),
      this.db.select({ total: count() }).from(projects),
    ]);
    return { items, total: totals?.total ?? 0 };
  }

  async update(id: string, changes: ProjectChanges): Promise<ProjectRecord | undefined> {
    const updates: Partial<typeof projects.$inferInsert> = { updatedAt: new Date() };
    if (changes.name !== undefined) updates.name = changes.name;
    if (changes.description !== undefined) updates.description = changes.description;

    const [row] = await this.db
      .update(projects)
      .set(updates)
      .where(eq(projects.id, id))
      .returning();
    return row;
  }

  async delete(id: string): Promise<boolean> {
    // events.project_id is ON DELETE SET NULL
    const rows = await this.db
      .delete(projects)
      .where(eq(projects.id, id))
      .returning({ id: projects.id });
    return rows.length > 0;
  }
}
