// fs errors can come from another realm (test runners), so match on shape.
export const isMissingFileError = (err: unknown): boolean =>
  typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
