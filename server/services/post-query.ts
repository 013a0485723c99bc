/**
 * Post Queries
 * Pure sort, search and update-summary helpers over a list of posts
 */

import type {
  Post,
  PostChanges,
  SearchCriteria,
  SortOptions,
  UpdatedFields,
} from '../types';

// Orders by code point, so astral characters sort after the whole BMP
function compareKeys(a: string, b: string): number {
  const left = Array.from(a, (char) => char.codePointAt(0) ?? 0);
  const right = Array.from(b, (char) => char.codePointAt(0) ?? 0);
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    if (left[i] !== right[i]) return left[i] - right[i];
  }
  return left.length - right.length;
}

/**
 * Sort posts by one field, ignoring case
 * Returns a new array; equal keys keep their original order in both directions
 */
export function sortPosts(posts: readonly Post[], options: SortOptions): Post[] {
  const sorted = [...posts];
  const { field } = options;
  if (!field) {
    return sorted;
  }

  const sign = options.direction === 'desc' ? -1 : 1;
  return sorted.sort(
    (a, b) =>
      sign * compareKeys(a[field].toLowerCase(), b[field].toLowerCase())
  );
}

/**
 * Posts whose title or content contains the matching query, ignoring case
 * Each post is returned once, in its original position
 */
export function searchPosts(
  posts: readonly Post[],
  criteria: SearchCriteria
): Post[] {
  const title = criteria.title?.toLowerCase();
  const content = criteria.content?.toLowerCase();

  return posts.filter(
    (post) =>
      (!!title && post.title.toLowerCase().includes(title)) ||
      (!!content && post.content.toLowerCase().includes(content))
  );
}

/**
 * Which fields a set of changes will overwrite, or null when it changes nothing
 */
export function describeChanges(changes: PostChanges): UpdatedFields | null {
  if (changes.title && changes.content) return 'title and content';
  if (changes.content) return 'content';
  if (changes.title) return 'title';
  return null;
}

export function updateMessage(postId: number, fields: UpdatedFields): string {
  return `${fields} of post (${postId}) was updated.`;
}

export function deleteMessage(postId: number): string {
  return `Post with id (${postId}) has been deleted successfully.`;
}
