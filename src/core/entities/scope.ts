import { err, ok, Result } from "neverthrow";

export const allScopes = [
  "writeBlogPosts",
  "readBookshelves",
  "writeBookshelves",
  "readBookshelfItems",
  "writeBookshelfItems",
  "readPms",
  "writePms",
  "writeFollowers",
  "readStories",
  "writeStories",
  "writeComments",
  "readUser",
  "writeUser",
  "readChapterRead",
  "writeChapterRead",
] as const;

/**
 * Permission an OAuth client may be granted.
 */
export type Scope = (typeof allScopes)[number];

export type ParseScopeError = {
  code: "unknown_scope";
  value: string;
  message: string;
};

const wireNames: Record<Scope, string> = {
  writeBlogPosts: "write_blog_posts",
  readBookshelves: "read_bookshelves",
  writeBookshelves: "write_bookshelves",
  readBookshelfItems: "read_bookshelf_items",
  writeBookshelfItems: "write_bookshelf_items",
  readPms: "read_pms",
  writePms: "write_pms",
  writeFollowers: "write_followers",
  // TODO: confirm against the API docs whether this should be "read_stories";
  // "read_followers" names a different permission.
  readStories: "read_followers",
  writeStories: "write_stories",
  writeComments: "write_comments",
  readUser: "read_user",
  writeUser: "write_user",
  readChapterRead: "read_chapter_read",
  writeChapterRead: "write_chapter_read",
};

const scopesByWireName = new Map<string, Scope>(
  allScopes.map((scope) => [wireNames[scope], scope]),
);

/**
 * Returns the scope name the API recognizes.
 */
export const scopeToWire = (scope: Scope): string => wireNames[scope];

/**
 * Parses a wire name back into a scope, keeping the rejected string so
 * callers can report which grant the API sent that this client does not know.
 */
export const scopeFromWire = (value: string): Result<Scope, ParseScopeError> => {
  const scope = scopesByWireName.get(value);
  if (!scope) {
    return err({
      code: "unknown_scope",
      value,
      message: `Could not parse ${value} as a FimFiction API scope.`,
    });
  }

  return ok(scope);
};

/**
 * Parses an OAuth scope parameter (space separated wire names).
 */
export const parseScopeList = (
  value: string,
): Result<Scope[], ParseScopeError> =>
  Result.combine(
    value
      .split(" ")
      .map((item) => item.trim())
      .filter(Boolean)
      .map((item) => scopeFromWire(item)),
  );
