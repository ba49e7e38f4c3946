import { asc, eq, sql } from "drizzle-orm";
import type { AppDatabase, DbExecutor } from "../db";
import { categories, feeds } from "../db/schema";
import type { Category } from "../db/schema";
import { NotFoundError, ValidationError, isUniqueViolation, toStorageError } from "../errors";

const MAX_NAME_LENGTH = 100;

export type CategorySummary = Category & { readonly feedCount: number };

/**
 * Names that mean "no category"; feeds filed under them get a null
 * category instead of a category row.
 */
export function isUncategorized(name: string): boolean {
  return /^(un-?categori[sz]ed|none)$/i.test(name.trim());
}

/**
 * Trims and checks a category name.
 * @throws ValidationError `invalid_category_name`
 */
export function validateCategoryName(name: string): string {
  const trimmed = name.trim();
  if (trimmed.length === 0) {
    throw new ValidationError("invalid_category_name", "category name is empty");
  }
  if (trimmed.length > MAX_NAME_LENGTH) {
    throw new ValidationError(
      "invalid_category_name",
      `category name is longer than ${MAX_NAME_LENGTH} characters`,
    );
  }
  if (/[\u0000-\u001f\u007f]/.test(trimmed)) {
    throw new ValidationError(
      "invalid_category_name",
      "category name contains control characters",
    );
  }
  return trimmed;
}

export function findCategoryByName(db: DbExecutor, name: string): Category | undefined {
  return db.select().from(categories).where(eq(categories.name, name.trim())).get();
}

/**
 * Returns the category with this name, creating it if needed. Uncategorized
 * names resolve to null.
 */
export function resolveCategoryId(db: DbExecutor, name: string | null | undefined): number | null {
  if (name === null || name === undefined || isUncategorized(name)) return null;
  const valid = validateCategoryName(name);
  const existing = findCategoryByName(db, valid);
  if (existing) return existing.id;
  return db.insert(categories).values({ name: valid }).returning().get().id;
}

export function listCategories(db: DbExecutor): Array<CategorySummary> {
  return db
    .select({
      id: categories.id,
      name: categories.name,
      createdAt: categories.createdAt,
      feedCount: sql<number>`(select count(*) from ${feeds} where ${feeds.categoryId} = ${categories.id})`,
    })
    .from(categories)
    .orderBy(asc(categories.name))
    .all();
}

/**
 * @throws ValidationError `invalid_category_name` or `duplicate_category_name`
 */
export function createCategory(db: DbExecutor, name: string): Category {
  const valid = validateCategoryName(name);
  if (isUncategorized(valid)) {
    throw new ValidationError("invalid_category_name", `"${valid}" is reserved`);
  }
  if (findCategoryByName(db, valid)) {
    throw new ValidationError("duplicate_category_name", `category "${valid}" already exists`);
  }
  try {
    return db.insert(categories).values({ name: valid }).returning().get();
  } catch (err) {
    if (isUniqueViolation(err)) {
      throw new ValidationError("duplicate_category_name", `category "${valid}" already exists`);
    }
    throw toStorageError(err);
  }
}

/**
 * @throws NotFoundError, ValidationError
 */
export function renameCategory(db: DbExecutor, id: number, name: string): Category {
  const valid = validateCategoryName(name);
  if (isUncategorized(valid)) {
    throw new ValidationError("invalid_category_name", `"${valid}" is reserved`);
  }
  const clash = findCategoryByName(db, valid);
  if (clash && clash.id !== id) {
    throw new ValidationError("duplicate_category_name", `category "${valid}" already exists`);
  }
  const updated = db
    .update(categories)
    .set({ name: valid })
    .where(eq(categories.id, id))
    .returning()
    .get();
  if (!updated) throw new NotFoundError("category", id);
  return updated;
}

/**
 * Deletes a category. Its feeds are moved to uncategorized, never deleted.
 * @returns the number of feeds that were reassigned
 * @throws NotFoundError
 */
export function deleteCategory(db: AppDatabase, id: number): number {
  return db.transaction((tx) => {
    const moved = tx
      .update(feeds)
      .set({ categoryId: null })
      .where(eq(feeds.categoryId, id))
      .run().changes;
    const deleted = tx.delete(categories).where(eq(categories.id, id)).run().changes;
    if (deleted === 0) throw new NotFoundError("category", id);
    return moved;
  });
}
