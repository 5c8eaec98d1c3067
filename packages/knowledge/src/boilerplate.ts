/**
 * Default boilerplate tables for scraped blog articles (WordPress layout)
 *
 * Patterns are compiled case-insensitive with dot matching newlines.
 */

export const DEFAULT_BOILERPLATE_PATTERNS: readonly string[] = [
  // Comment form
  'Leave a Reply\\s*Cancel reply.*?for the next time I comment\\.',
  'Comment\\s*Enter your name.*?for the next time I comment\\.',
  'Enter your name or username to comment.*?for the next time I comment\\.',
  // Footer and post metadata
  'Copyright ©\\s*\\d{4}.*?All rights reserved\\.?',
  'Post author:\\s*.*?\\s*Post published:\\s*.*?\\s*Reading time:\\s*.*?\\s*',
  'Thank you for sharing this post!\\s*Share this content\\s*Opens in a new window\\s*',
  'Post author:.*?Reading time:.*?read',
  // Navigation
  'Previous Post.*?Next Post',
  // Social sharing
  'Share this:.*?Click to share',
  'Share this content.*?Opens in a new window',
  'Opens in a new window\\s*Opens in a new window\\s*Opens in a new window',
  // Search prompt
  'Search for:.*?search',
  // Category and tag listings
  'Categories.*?\\(\\d+\\).*?Spanish Teaching.*?\\(\\d+\\)',
  '\\(\\d+\\)\\s*Argentinian Spanish\\s*\\(\\d+\\)\\s*Argentinian Spanish Curse Words\\s*\\(\\d+\\)',
  'Filed under:.*?Tags:',
  'Comments\\s*\\(\\d+\\)',
  // Site footer ("<site> · <year> <x> · Privacy Policy")
  '[\\w ]{3,60}\\s*·\\s*\\S+\\s*\\S+\\s*·\\s*Privacy Policy',
  // Author bio
  'About the author.*?View all posts',
];

/**
 * Headings after which everything is boilerplate
 */
export const DEFAULT_SPLIT_POINTS: readonly string[] = [
  'Leave a Reply',
  'Related Posts',
  'Categories',
  'Thank you for sharing this post',
  'Post navigation',
];
