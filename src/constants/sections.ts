/**
 * Job section heading constants
 *
 * Headings (after decorative symbols are stripped and the text lowercased)
 * mapped to the job field that the following lines belong to.
 */

export type SectionField =
  | "aboutCompany"
  | "aboutJob"
  | "qualifications"
  | "benefits"
  | "salary"
  | "workEnvironment";

export const SECTION_FIELDS: readonly SectionField[] = [
  "aboutCompany",
  "aboutJob",
  "qualifications",
  "benefits",
  "salary",
  "workEnvironment",
];

export const SECTION_HEADINGS: Readonly<Record<SectionField, readonly string[]>> = {
  aboutCompany: [
    "about us",
    "about the company",
    "who we are",
    "company overview",
    "our mission",
    "our story",
  ],
  aboutJob: [
    "about the role",
    "about the job",
    "about this role",
    "about the position",
    "the role",
    "role overview",
    "job description",
    "the opportunity",
    "what you'll do",
    "what you will do",
    "what you’ll do",
    "responsibilities",
    "key responsibilities",
    "your responsibilities",
    "in this role",
    "your impact",
    "day to day",
  ],
  qualifications: [
    "qualifications",
    "minimum qualifications",
    "preferred qualifications",
    "basic qualifications",
    "requirements",
    "what we're looking for",
    "what we’re looking for",
    "what you'll bring",
    "what you bring",
    "who you are",
    "about you",
    "you have",
    "nice to have",
    "bonus points",
  ],
  benefits: [
    "benefits",
    "perks",
    "perks and benefits",
    "what we offer",
    "why join us",
    "why you'll love working here",
  ],
  salary: [
    "compensation",
    "salary",
    "salary range",
    "pay range",
    "pay transparency",
    "base salary",
    "compensation range",
  ],
  workEnvironment: [
    "work environment",
    "where you'll work",
    "location and work environment",
    "working model",
    "remote policy",
  ],
};

/**
 * Lines longer than this are never treated as headings
 */
export const MAX_HEADING_LENGTH = 60;
