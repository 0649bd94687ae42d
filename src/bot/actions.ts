// pattern: Functional Core
/**
 * Callback data carried by inline buttons, modelled as a tagged union.
 *
 * Menu actions are owner-only; the unlock action is open to anyone in the
 * chat. Wire format is `menu:<item>` or `unlock`, well under Telegram's
 * 64-byte callback limit.
 */

export const MENU_ITEMS = [
  "check_now",
  "toggle_monitoring",
  "status",
  "view_keywords",
] as const;

export type MenuItem = (typeof MENU_ITEMS)[number];

export type CallbackAction =
  | { readonly kind: "menu"; readonly item: MenuItem }
  | { readonly kind: "unlock" };

function isMenuItem(value: string): value is MenuItem {
  return MENU_ITEMS.some((item) => item === value);
}

export function encodeAction(action: CallbackAction): string {
  return action.kind === "menu" ? `menu:${action.item}` : "unlock";
}

export function parseAction(data: string | undefined): CallbackAction | null {
  if (!data) return null;
  if (data === "unlock") return { kind: "unlock" };

  const [domain, item] = data.split(":");
  if (domain === "menu" && item !== undefined && isMenuItem(item)) {
    return { kind: "menu", item };
  }
  return null;
}

export function isActionAllowed(
  action: CallbackAction,
  userId: number,
  ownerId: number | null,
): boolean {
  switch (action.kind) {
    case "unlock":
      return true;
    case "menu":
      return ownerId !== null && userId === ownerId;
  }
}
