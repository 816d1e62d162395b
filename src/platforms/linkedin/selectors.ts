import { ElementLocator } from "../locator";

export const LINKEDIN_SELECTORS = {
  VERSION: "2024.06",
  LOGIN_URL: "https://www.linkedin.com/login",

  AUTH: {
    USERNAME_INPUT: "input#username",
    PASSWORD_INPUT: "input#password",
    LOGIN_ERROR: "#error-for-password, #error-for-username",
    LOGGED_IN_INDICATOR: "#global-nav, nav.global-nav, .feed-identity-module",
  },

  POSTS: {
    POST_ITEM: "div.feed-shared-update-v2",
    SEE_MORE: "button.feed-shared-inline-show-more-text__see-more-less-toggle",
    POST_TEXT: "span.break-words, div.feed-shared-update-v2__description",
    POST_AUTHOR: ".update-components-actor__title",
    POST_TIMESTAMP: ".update-components-actor__sub-description",
    LIKES_COUNT: "span.social-details-social-counts__reactions-count",
    SOCIAL_COUNTS: '.social-details-social-counts span[aria-hidden="true"]',
    IMAGES: "img.feed-shared-image__image, img.feed-shared-image__img",
    VIDEOS: "video.feed-shared-video__video, video.feed-shared-video__player",
  },

  COMMENTS: {
    OPEN_BUTTON: 'button[aria-label*="comments"]',
    LOAD_MORE: "button.comments-comments-list__load-more-comments-button",
    COMMENT_ITEM: "article.comments-comment-item, div.comments-comment-item",
    COMMENT_TEXT: "span.comments-comment-item__main-content",
  },
};

export const LINKEDIN_SELECTORS_FALLBACK = {
  AUTH: {
    USERNAME_INPUT: 'input[name="session_key"]',
    PASSWORD_INPUT: 'input[name="session_password"]',
  },
  POSTS: {
    POST_ITEM: "div.feed-shared-update",
    POST_TEXT: ".update-components-text",
    POST_AUTHOR: ".update-components-actor__name",
    SOCIAL_COUNTS: 'span[aria-hidden="true"]',
  },
  COMMENTS: {
    LOAD_MORE: 'button[class*="load-more-comments-button"]',
    COMMENT_ITEM: "article.comments-comment-entity",
    COMMENT_TEXT: ".comments-comment-item__main-content, .comments-comment-item-content-body",
  },
};

export const authLocator = new ElementLocator<typeof LINKEDIN_SELECTORS.AUTH>({
  version: LINKEDIN_SELECTORS.VERSION,
  primary: LINKEDIN_SELECTORS.AUTH,
  fallback: LINKEDIN_SELECTORS_FALLBACK.AUTH,
});

export const postLocator = new ElementLocator<typeof LINKEDIN_SELECTORS.POSTS>({
  version: LINKEDIN_SELECTORS.VERSION,
  primary: LINKEDIN_SELECTORS.POSTS,
  fallback: LINKEDIN_SELECTORS_FALLBACK.POSTS,
});

export const commentLocator = new ElementLocator<typeof LINKEDIN_SELECTORS.COMMENTS>({
  version: LINKEDIN_SELECTORS.VERSION,
  primary: LINKEDIN_SELECTORS.COMMENTS,
  fallback: LINKEDIN_SELECTORS_FALLBACK.COMMENTS,
});
