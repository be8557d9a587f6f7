import type {
  AttachmentStoreHooks,
  AfterAddContext,
  AfterDeleteContext,
  AfterClearContext,
  ErrorContext,
} from "../types/attachment.js";

export async function runAfterAddHooks(
  hooks: AttachmentStoreHooks | undefined,
  ctx: AfterAddContext,
): Promise<void> {
  if (!hooks?.afterAdd) return;
  for (const hook of hooks.afterAdd) {
    await hook(ctx);
  }
}

export async function runAfterDeleteHooks(
  hooks: AttachmentStoreHooks | undefined,
  ctx: AfterDeleteContext,
): Promise<void> {
  if (!hooks?.afterDelete) return;
  for (const hook of hooks.afterDelete) {
    await hook(ctx);
  }
}

export async function runAfterClearHooks(
  hooks: AttachmentStoreHooks | undefined,
  ctx: AfterClearContext,
): Promise<void> {
  if (!hooks?.afterClear) return;
  for (const hook of hooks.afterClear) {
    await hook(ctx);
  }
}

export async function runErrorHooks(
  hooks: AttachmentStoreHooks | undefined,
  ctx: ErrorContext,
): Promise<void> {
  if (!hooks?.onError) return;
  for (const hook of hooks.onError) {
    await hook(ctx);
  }
}

export function mergeHooks(
  ...sets: Array<AttachmentStoreHooks | undefined>
): AttachmentStoreHooks {
  const merged: Required<AttachmentStoreHooks> = {
    afterAdd: [],
    afterDelete: [],
    afterClear: [],
    onError: [],
  };
  for (const hooks of sets) {
    if (!hooks) continue;
    merged.afterAdd.push(...(hooks.afterAdd ?? []));
    merged.afterDelete.push(...(hooks.afterDelete ?? []));
    merged.afterClear.push(...(hooks.afterClear ?? []));
    merged.onError.push(...(hooks.onError ?? []));
  }
  return merged;
}
