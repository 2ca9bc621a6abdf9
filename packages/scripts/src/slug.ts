/**
 * URL-safe slug for a table or module title
 */
export const createSlug = (title: string): string =>
  title
    .toLowerCase()
    .replace(/[\s/]+/g, '-')
    .replace(/[(),']+/g, '')
