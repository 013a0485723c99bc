/**
 * Post Storage
 *
 * The post registry: an ordered, mutable list of posts held in memory.
 * All reads and writes go through one Mutex, so each operation sees and
 * leaves a consistent list. Reads hand out copies of the records.
 */

import { Mutex } from './mutex';
import { describeChanges, searchPosts, sortPosts } from './services/post-query';
import type {
  IdStrategy,
  NewPost,
  Post,
  PostChanges,
  SearchCriteria,
  SortOptions,
  UpdatedFields,
} from './types';

export const SEED_POSTS: readonly Post[] = [
  { id: 1, title: 'First post', content: 'This is the first post.' },
  { id: 2, title: 'Second post', content: 'This is the second post.' },
];

export type UpdatePostResult =
  | { status: 'not_found' }
  | { status: 'unchanged'; post: Post }
  | { status: 'updated'; post: Post; fields: UpdatedFields };

export interface IPostStorage {
  listPosts(sort?: SortOptions): Promise<Post[]>;
  /** First post with this id */
  getPost(id: number): Promise<Post | undefined>;
  createPost(post: NewPost): Promise<Post>;
  /** Removes the first post with this id; false when there is none */
  deletePost(id: number): Promise<boolean>;
  updatePost(id: number, changes: PostChanges): Promise<UpdatePostResult>;
  searchPosts(criteria: SearchCriteria): Promise<Post[]>;
  countPosts(): Promise<number>;
}

export interface PostStorageOptions {
  /** Initial contents; defaults to SEED_POSTS */
  posts?: readonly Post[];
  idStrategy?: IdStrategy;
}

function copyPost(post: Post): Post {
  return { id: post.id, title: post.title, content: post.content };
}

export class MemoryPostStorage implements IPostStorage {
  private readonly posts: Post[];
  private readonly lock = new Mutex();
  private readonly idStrategy: IdStrategy;
  private highestId: number;

  constructor(options: PostStorageOptions = {}) {
    this.posts = (options.posts ?? SEED_POSTS).map(copyPost);
    this.idStrategy = options.idStrategy ?? 'length';
    this.highestId = this.posts.reduce((max, post) => Math.max(max, post.id), 0);
  }

  async listPosts(sort?: SortOptions): Promise<Post[]> {
    return this.lock.runExclusive(() => {
      const snapshot = this.posts.map(copyPost);
      return sort ? sortPosts(snapshot, sort) : snapshot;
    });
  }

  async getPost(id: number): Promise<Post | undefined> {
    return this.lock.runExclusive(() => {
      const post = this.posts.find((candidate) => candidate.id === id);
      return post ? copyPost(post) : undefined;
    });
  }

  async createPost(input: NewPost): Promise<Post> {
    return this.lock.runExclusive(() => {
      const post: Post = {
        id: this.nextId(),
        title: input.title,
        content: input.content,
      };
      this.posts.push(post);
      this.highestId = Math.max(this.highestId, post.id);
      return copyPost(post);
    });
  }

  async deletePost(id: number): Promise<boolean> {
    return this.lock.runExclusive(() => {
      const index = this.posts.findIndex((post) => post.id === id);
      if (index === -1) {
        return false;
      }
      this.posts.splice(index, 1);
      return true;
    });
  }

  async updatePost(id: number, changes: PostChanges): Promise<UpdatePostResult> {
    return this.lock.runExclusive((): UpdatePostResult => {
      const post = this.posts.find((candidate) => candidate.id === id);
      if (!post) {
        return { status: 'not_found' };
      }

      const fields = describeChanges(changes);
      if (!fields) {
        return { status: 'unchanged', post: copyPost(post) };
      }

      if (changes.title) post.title = changes.title;
      if (changes.content) post.content = changes.content;

      return { status: 'updated', post: copyPost(post), fields };
    });
  }

  async searchPosts(criteria: SearchCriteria): Promise<Post[]> {
    return this.lock.runExclusive(() =>
      searchPosts(this.posts, criteria).map(copyPost)
    );
  }

  async countPosts(): Promise<number> {
    return this.lock.runExclusive(() => this.posts.length);
  }

  private nextId(): number {
    if (this.idStrategy === 'sequence') {
      return this.highestId + 1;
    }
    return this.posts.length + 1;
  }
}

export function createPostStorage(options: PostStorageOptions = {}): IPostStorage {
  return new MemoryPostStorage(options);
}
