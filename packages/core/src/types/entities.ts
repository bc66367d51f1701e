export type UserId = number;

/** Public view of a registered user. The password hash never leaves the store layer. */
export interface User {
  readonly id: UserId;
  readonly username: string;
}

/** Stored credential row. */
export interface UserRecord extends User {
  readonly passwordHash: string;
}

export interface Category {
  readonly id: number;
  readonly name: string;
}

export interface Post {
  readonly id: number;
  readonly title: string;
  readonly content: string;
  readonly createdAt: Date;
  readonly authorId: UserId;
  readonly categoryId: number | null;
}

export interface Comment {
  readonly id: number;
  readonly content: string;
  readonly createdAt: Date;
  readonly postId: number;
  readonly authorId: UserId;
}

// --- Inputs ---

export interface NewUser {
  readonly username: string;
  readonly password: string;
}

/** Used for both creation and full replacement of a post. */
export interface PostInput {
  readonly title: string;
  readonly content: string;
  readonly categoryId?: number | null;
}

export interface CommentInput {
  readonly content: string;
}

export interface PostFilter {
  readonly categoryId?: number;
}

/** Body returned by the token endpoint. */
export interface AccessTokenResponse {
  readonly access_token: string;
  readonly token_type: 'bearer';
}
