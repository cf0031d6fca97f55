export { createMenuRegistry, registerBuiltinEntries } from "./builtin/index";
export { askPath, confirm } from "./confirm";
export { MenuRegistry } from "./registry";
export type { MenuContext, MenuEntry, MenuOutcome } from "./types";
