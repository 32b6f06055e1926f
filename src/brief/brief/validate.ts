/**
 * Structural checks on a finished brief
 */

import type { Brief } from "./schema.js";

export const MIN_SUMMARY_BULLETS = 3;
export const MAX_SUMMARY_BULLETS = 6;

/**
 * Validate that the brief contains all required sections.
 * Returns every issue found; an empty list means the brief is complete.
 */
export function validateBrief(brief: Brief): string[] {
  const issues: string[] = [];

  if (brief.summary_bullets.length < MIN_SUMMARY_BULLETS) {
    issues.push(`summary_bullets must have at least ${MIN_SUMMARY_BULLETS} items`);
  }
  if (brief.summary_bullets.length > MAX_SUMMARY_BULLETS) {
    issues.push(`summary_bullets must have at most ${MAX_SUMMARY_BULLETS} items`);
  }

  if (brief.ir_releases.length === 0) {
    issues.push("ir_releases required");
  }
  if (brief.news.length === 0) {
    issues.push("news required");
  }
  if (brief.drivers.length === 0) {
    issues.push("drivers required");
  }
  if (brief.risks.length === 0) {
    issues.push("risks required");
  }

  return issues;
}
