/// display titles for `@tag` keywords. unknown keywords are shown
/// capitalised, so `@note` becomes "Note".

const titles: Record<string, string> = {
  param: "Parameters",
  arg: "Parameters",
  error: "Errors",
  throws: "Throws",
  author: "Author",
  see: "See also",
  deprecated: "Deprecated",
  compat: "Compatibility",
  tbd: "To be done",
  bug: "Bug",
  license: "License",
  since: "Since",
  version: "Version"
};

export function tagTitle(keyword: string): string {
  return titles[keyword] ?? keyword.charAt(0).toUpperCase() + keyword.slice(1);
}
