/**
 * Window Record Model
 *
 * Normalized view of one window-bearing container from `swaymsg -t get_tree`.
 * Only the fields the toggle engine reads are decoded; everything else in the
 * Sway node is ignored.
 */

import { z } from "zod";

/**
 * Node types that carry an actual window (tiled or floating)
 */
export const WINDOW_NODE_TYPES = ["con", "floating_con"] as const;

export type WindowNodeType = (typeof WINDOW_NODE_TYPES)[number];

/**
 * X11 window properties (present only for Xwayland windows)
 */
export interface WindowProperties {
  class?: string;
}

export interface WindowRecord {
  /** Window title (Sway `name`) */
  title?: string;

  /** Wayland app_id */
  app_id?: string;

  /** X11 properties block */
  window_properties?: WindowProperties;

  /** Whether this window has input focus */
  focused: boolean;

  /** Raw node type (`con` or `floating_con`) */
  type: string;
}

/** Sway emits `null` for unset strings; both null and missing mean absent */
const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

const WindowPropertiesSchema = z
  .object({
    class: optionalString,
  })
  .passthrough()
  .transform((props): WindowProperties =>
    props.class === undefined ? {} : { class: props.class }
  );

/**
 * Zod schema decoding a raw Sway node into a WindowRecord
 */
export const WindowRecordSchema = z
  .object({
    name: optionalString,
    app_id: optionalString,
    focused: z.boolean(),
    window_properties: WindowPropertiesSchema.nullish(),
    type: z.string(),
  })
  .passthrough()
  .transform((node): WindowRecord => {
    const record: WindowRecord = {
      focused: node.focused,
      type: node.type,
    };
    if (node.name !== undefined) record.title = node.name;
    if (node.app_id !== undefined) record.app_id = node.app_id;
    if (node.window_properties) record.window_properties = node.window_properties;
    return record;
  });

export function isWindowNodeType(type: unknown): type is WindowNodeType {
  return typeof type === "string" &&
    (WINDOW_NODE_TYPES as readonly string[]).includes(type);
}
