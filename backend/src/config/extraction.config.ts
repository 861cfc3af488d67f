export const HARD_PAGE_LIMIT = 500;
export const MAX_EXTRACTED_CHARS = 500_000;
export const LOW_TEXT_WARNING_CHARS = 100;

export const REFERENCE_MAX_PAGES = 1000;
export const SYLLABUS_MAX_PAGES = 50;
