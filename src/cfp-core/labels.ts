import { and, asc, eq } from 'drizzle-orm';
import { labels, talkLabels } from '@db/schema/index';
import type { EngineContext } from './context';
import { notFound, permissionDenied, validationError } from './errors';
import { isOrganizer, ownsTalk, type Actor } from './identity';
import {
  insertTalkLabels,
  labelsOfTalk,
  requireLabels,
  requireTalk,
  type Label,
} from './queries';
import { readStore, runInTransaction } from './transaction';
import {
  createLabelSchema,
  idSchema,
  parseInput,
  updateLabelSchema,
  type CreateLabelInput,
  type UpdateLabelInput,
} from './validation';

export type { Label };
export type TalkLabel = typeof talkLabels.$inferSelect;

// ---------------------------------------------------------------------------
// Catalogue
// ---------------------------------------------------------------------------

/**
 * `aiGenerated` marks labels created by the automated tagging collaborator,
 * so reviewers can tell them from hand-made ones.
 */
export async function createLabel(
  ctx: EngineContext,
  input: CreateLabelInput,
  options: { aiGenerated?: boolean } = {},
): Promise<Label> {
  const data = parseInput(createLabelSchema, input);
  return runInTransaction(ctx, async (tx) => {
    const [label] = await tx
      .insert(labels)
      .values({ ...data, isAiGenerated: options.aiGenerated ?? false, createdAt: ctx.clock.now() })
      .returning();
    return label;
  });
}

export async function updateLabel(
  ctx: EngineContext,
  labelId: string,
  patch: UpdateLabelInput,
): Promise<Label> {
  const changes = parseInput(updateLabelSchema, patch);
  if (Object.keys(changes).length === 0) return getLabel(ctx, labelId);

  return runInTransaction(ctx, async (tx) => {
    const [label] = await tx
      .update(labels)
      .set(changes)
      .where(eq(labels.id, labelId))
      .returning();
    if (!label) throw notFound('Label', labelId);
    return label;
  });
}

export async function listLabels(ctx: EngineContext): Promise<Label[]> {
  return readStore(() => ctx.db.select().from(labels).orderBy(asc(labels.name)));
}

export async function getLabel(ctx: EngineContext, labelId: string): Promise<Label> {
  const [label] = await readStore(() => ctx.db.select().from(labels).where(eq(labels.id, labelId)));
  if (!label) throw notFound('Label', labelId);
  return label;
}

/** Removes the label and, through the junction's cascade, every attachment of it. */
export async function deleteLabel(ctx: EngineContext, labelId: string): Promise<void> {
  await runInTransaction(ctx, async (tx) => {
    const removed = await tx
      .delete(labels)
      .where(eq(labels.id, labelId))
      .returning({ id: labels.id });
    if (removed.length === 0) throw notFound('Label', labelId);
  });
}

// ---------------------------------------------------------------------------
// Attachments
// ---------------------------------------------------------------------------

/**
 * Attaches labels to a talk, recording who added them. Labels already on the
 * talk keep their original provenance. Organizers may tag any talk; a
 * speaker only their own.
 */
export async function addLabels(
  ctx: EngineContext,
  talkId: string,
  labelIds: readonly string[],
  actor: Actor,
): Promise<Label[]> {
  if (labelIds.length === 0) {
    throw validationError('At least one label id is required');
  }
  for (const id of labelIds) parseInput(idSchema, id);

  return runInTransaction(ctx, async (tx) => {
    const talk = await requireTalk(tx, talkId);
    if (!isOrganizer(actor) && !ownsTalk(actor, talk)) {
      throw permissionDenied('You can only label your own talks');
    }
    await requireLabels(tx, labelIds);
    await insertTalkLabels(tx, talkId, labelIds, actor.userId, ctx.clock.now());
    return labelsOfTalk(tx, talkId);
  });
}

/** Idempotent: detaching a label the talk does not carry is not an error. */
export async function removeLabel(
  ctx: EngineContext,
  talkId: string,
  labelId: string,
): Promise<boolean> {
  return runInTransaction(ctx, async (tx) => {
    const removed = await tx
      .delete(talkLabels)
      .where(and(eq(talkLabels.talkId, talkId), eq(talkLabels.labelId, labelId)))
      .returning({ labelId: talkLabels.labelId });
    return removed.length > 0;
  });
}

export async function labelsForTalk(ctx: EngineContext, talkId: string): Promise<Label[]> {
  return readStore(async () => {
    await requireTalk(ctx.db, talkId);
    return labelsOfTalk(ctx.db, talkId);
  });
}

/** Junction rows for a talk, with provenance. */
export async function attachmentsOfTalk(ctx: EngineContext, talkId: string): Promise<TalkLabel[]> {
  return readStore(() =>
    ctx.db
      .select()
      .from(talkLabels)
      .where(eq(talkLabels.talkId, talkId))
      .orderBy(asc(talkLabels.addedAt)),
  );
}
