import type { Category, Comment, Post, User } from '@blog-api/core';

export interface UserResponse {
  id: number;
  username: string;
}

export interface CategoryResponse {
  id: number;
  name: string;
}

export interface PostResponse {
  id: number;
  title: string;
  content: string;
  created_at: string;
  author_id: number;
  category_id: number | null;
}

export interface CommentResponse {
  id: number;
  content: string;
  created_at: string;
  post_id: number;
  author_id: number;
}

export function formatUser(user: User): UserResponse {
  return { id: user.id, username: user.username };
}

export function formatCategory(category: Category): CategoryResponse {
  return { id: category.id, name: category.name };
}

export function formatPost(post: Post): PostResponse {
  return {
    id: post.id,
    title: post.title,
    content: post.content,
    created_at: post.createdAt.toISOString(),
    author_id: post.authorId,
    category_id: post.categoryId,
  };
}

export function formatComment(comment: Comment): CommentResponse {
  return {
    id: comment.id,
    content: comment.content,
    created_at: comment.createdAt.toISOString(),
    post_id: comment.postId,
    author_id: comment.authorId,
  };
}
