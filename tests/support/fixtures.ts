export const LOGIN_URL = "https://www.linkedin.com/login";
export const FEED_URL = "https://www.linkedin.com/feed/";
export const COMPANY_URL = "https://www.linkedin.com/company/acme-robotics/posts/";

export interface PostFixture {
  text?: string;
  author?: string;
  timestamp?: string;
  likes?: string;
  commentsLabel?: string;
  sharesLabel?: string;
  images?: string[];
  videos?: string[];
  comments?: string[];
  loadMore?: boolean;
  seeMore?: boolean;
}

export function commentHtml(text: string): string {
  return `<article class="comments-comment-item"><span class="comments-comment-item__main-content">${text}</span></article>`;
}

export function postHtml(post: PostFixture): string {
  const parts: string[] = [];
  if (post.author !== undefined) parts.push(`<span class="update-components-actor__title">${post.author}</span>`);
  if (post.timestamp !== undefined) {
    parts.push(`<span class="update-components-actor__sub-description">${post.timestamp}</span>`);
  }
  if (post.text !== undefined) parts.push(`<span class="break-words">${post.text}</span>`);
  if (post.seeMore) {
    parts.push('<button class="feed-shared-inline-show-more-text__see-more-less-toggle">see more</button>');
  }
  for (const src of post.images ?? []) parts.push(`<img class="feed-shared-image__image" src="${src}">`);
  for (const src of post.videos ?? []) parts.push(`<video class="feed-shared-video__video" src="${src}"></video>`);
  if (post.likes !== undefined) {
    parts.push(`<span class="social-details-social-counts__reactions-count">${post.likes}</span>`);
  }

  const counts: string[] = [];
  if (post.commentsLabel !== undefined) counts.push(`<span aria-hidden="true">${post.commentsLabel}</span>`);
  if (post.sharesLabel !== undefined) counts.push(`<span aria-hidden="true">${post.sharesLabel}</span>`);
  if (counts.length > 0) parts.push(`<div class="social-details-social-counts">${counts.join("")}</div>`);

  if (post.comments !== undefined) {
    parts.push('<button aria-label="Open comments">Comment</button>');
    const loadMore = post.loadMore
      ? '<button class="comments-comments-list__load-more-comments-button">Load more comments</button>'
      : "";
    parts.push(`<div class="comments-comments-list">${post.comments.map(commentHtml).join("")}${loadMore}</div>`);
  }

  return `<div class="feed-shared-update-v2">${parts.join("")}</div>`;
}

export function feedHtml(posts: PostFixture[]): string {
  return `<html><body><main class="scaffold-finite-scroll">${posts.map(postHtml).join("")}</main></body></html>`;
}

export const LOGIN_PAGE_HTML = `<html><body>
  <form class="login__form">
    <input id="username" name="session_key" type="text">
    <div id="error-for-username" class="form__label--error hidden__imp" role="alert"></div>
    <input id="password" name="session_password" type="password">
    <div id="error-for-password" class="form__label--error hidden__imp" role="alert"></div>
    <button type="submit">Sign in</button>
  </form>
</body></html>`;

export const LOGIN_REJECTED_HTML = `<html><body>
  <form class="login__form">
    <input id="username" name="session_key" type="text">
    <div id="error-for-username" class="form__label--error hidden__imp" role="alert"></div>
    <input id="password" name="session_password" type="password">
    <div id="error-for-password" class="form__label--error" role="alert">Wrong email or password. Try again.</div>
  </form>
</body></html>`;

export const HOME_FEED_HTML = '<html><body><nav id="global-nav"></nav><main></main></body></html>';

export function staticPosts(count: number): PostFixture[] {
  return Array.from({ length: count }, (_, i) => ({
    text: `Update number ${i + 1} from the robotics team`,
    author: "Acme Robotics",
    timestamp: `${i + 1}d`,
    likes: String(10 * (i + 1)),
    commentsLabel: `${i + 1} comments`,
    sharesLabel: `${i} reposts`,
    comments: [`Great news ${i + 1}`],
  }));
}
