/**
 * Post model types shared by storage, query helpers and route handlers
 */

export interface Post {
  id: number;
  title: string;
  content: string;
}

export interface NewPost {
  title: string;
  content: string;
}

/** Fields an update may overwrite; absent means "leave as is" */
export interface PostChanges {
  title?: string;
  content?: string;
}

export type SortField = 'title' | 'content';

export type SortDirection = 'asc' | 'desc';

export interface SortOptions {
  field?: SortField;
  direction: SortDirection;
}

export interface SearchCriteria {
  title?: string;
  content?: string;
}

/**
 * How new post ids are assigned
 * - length: registry size + 1 (can repeat an id after a delete)
 * - sequence: one past the highest id the registry has ever held
 */
export type IdStrategy = 'length' | 'sequence';

/** Which fields an update actually overwrote */
export type UpdatedFields = 'title' | 'content' | 'title and content';
