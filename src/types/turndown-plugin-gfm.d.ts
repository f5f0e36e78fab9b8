// turndown-plugin-gfm ships no type declarations and has no @types package.
declare module "turndown-plugin-gfm" {
    import type TurndownService from "turndown";

    export const gfm: TurndownService.Plugin;
}
