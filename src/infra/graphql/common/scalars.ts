/**
 * Common GraphQL scalars
 */

export const CommonScalars = /* GraphQL */ `
  # ---------------------------------------------------------------------------
  # Date & Time
  # ---------------------------------------------------------------------------
  "ISO 8601 calendar date string (YYYY-MM-DD)"
  scalar Date
`;
