export const MAX_COMMENT_LEVEL = 3;

export type Clock = () => Date;

export type AuthorInfo = {
  userId: string;
  nickname: string;
  avatarUrl: string | null;
};

export type PostImage = {
  imageId: string;
  imagePath: string;
  displayOrder: number;
};

export type Post = {
  postId: string;
  authorId: string;
  content: string;
  viewCount: number;
  likeCount: number;
  commentCount: number;
  createdAt: string;
  updatedAt: string;
  images: PostImage[];
  liked: boolean;
  author: AuthorInfo | null;
};

export type Comment = {
  commentId: string;
  postId: string;
  authorId: string;
  parentId: string | null;
  content: string;
  likeCount: number;
  replyCount: number;
  level: number;
  createdAt: string;
  updatedAt: string;
  liked: boolean;
  author: AuthorInfo | null;
  // Attached for top-level comments and, recursively, for every reply under them.
  replies?: Comment[];
};

export type CommentDeletion = {
  removedComments: number;
  removedLikes: number;
};
