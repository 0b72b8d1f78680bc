/**
 * Window Identifier Model
 *
 * Declarative criterion used both to find an application's windows in the
 * Sway tree and to address them in IPC commands.
 */

import { z } from "zod";

/**
 * Identifier variant, named after the Sway criteria attribute it maps to
 */
export type IdentifierKind = "title" | "app_id" | "class";

/** Match by window title (Sway `name` field) */
export interface TitleIdentifier {
  kind: "title";
  value: string;
}

/** Match by Wayland app_id */
export interface AppIdIdentifier {
  kind: "app_id";
  value: string;
}

/** Match by X11 WM_CLASS (Xwayland windows) */
export interface ClassIdentifier {
  kind: "class";
  value: string;
}

export type WindowIdentifier = TitleIdentifier | AppIdIdentifier | ClassIdentifier;

export function byTitle(value: string): TitleIdentifier {
  return { kind: "title", value };
}

export function byAppId(value: string): AppIdIdentifier {
  return { kind: "app_id", value };
}

export function byClass(value: string): ClassIdentifier {
  return { kind: "class", value };
}

/**
 * Zod schema for the configuration form of an identifier.
 *
 * Exactly one of `title`, `app_id` or `class` must be set:
 *   { "app_id": "obsidian" }
 */
export const WindowIdentifierSchema = z
  .object({
    title: z.string().min(1).optional(),
    app_id: z.string().min(1).optional(),
    class: z.string().min(1).optional(),
  })
  .strict()
  .transform((raw, ctx): WindowIdentifier => {
    const set = (["title", "app_id", "class"] as const).filter(
      (key) => raw[key] !== undefined,
    );

    if (set.length !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `identifier must set exactly one of title, app_id, class (got ${
          set.length === 0 ? "none" : set.join(", ")
        })`,
      });
      return z.NEVER;
    }

    if (raw.title !== undefined) return byTitle(raw.title);
    if (raw.app_id !== undefined) return byAppId(raw.app_id);
    if (raw.class !== undefined) return byClass(raw.class);
    return z.NEVER;
  });

/**
 * Render identifier for human-readable output (e.g. `app_id=obsidian`)
 */
export function describeIdentifier(identifier: WindowIdentifier): string {
  return `${identifier.kind}=${identifier.value}`;
}
