export { createCategory, listCategories, DUPLICATE_CATEGORY_MESSAGE } from './category-service.js';
export {
  createPost,
  listPosts,
  getPost,
  updatePost,
  deletePost,
  POST_NOT_FOUND_MESSAGE,
  CATEGORY_NOT_FOUND_MESSAGE,
} from './post-service.js';
export { createComment, listComments } from './comment-service.js';
