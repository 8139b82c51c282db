/**
 * YAML frontmatter handling for Markdown exports
 */

import matter from 'gray-matter';

/**
 * Parse frontmatter from markdown content
 */
export function parseFrontmatter(content: string): {
  frontmatter: Record<string, unknown>;
  body: string;
} {
  const { data, content: body } = matter(content);
  return {
    frontmatter: { ...data },
    body: body.trim(),
  };
}

/**
 * Stringify frontmatter and content to markdown
 */
export function stringifyFrontmatter(frontmatter: Record<string, unknown>, body = ''): string {
  return matter.stringify(body, frontmatter);
}
