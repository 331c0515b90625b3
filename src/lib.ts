export * from "./errors.js";
export * from "./notebook.js";
export { parseHeading, scanHeadings, stripNumber, isContentsCell, type HeadingLine, type LocatedHeading } from "./markdown.js";
export * from "./headings.js";
export * from "./contents.js";
export * from "./tasks.js";
export * from "./variants.js";
export * from "./outline.js";
export * from "./notebook-fs.js";
export * from "./series.js";
export * from "./yjs-notebook.js";
