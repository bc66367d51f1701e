import type { BlogQueryable } from '../database.js';
import { UserRepository } from './user-repository.js';
import { CategoryRepository } from './category-repository.js';
import { PostRepository } from './post-repository.js';
import { CommentRepository } from './comment-repository.js';

export { UserRepository } from './user-repository.js';
export { CategoryRepository } from './category-repository.js';
export { PostRepository, type PostValues } from './post-repository.js';
export { CommentRepository } from './comment-repository.js';

export interface BlogRepositories {
  readonly users: UserRepository;
  readonly categories: CategoryRepository;
  readonly posts: PostRepository;
  readonly comments: CommentRepository;
}

export function createRepositories(db: BlogQueryable): BlogRepositories {
  return {
    users: new UserRepository(db),
    categories: new CategoryRepository(db),
    posts: new PostRepository(db),
    comments: new CommentRepository(db),
  };
}
