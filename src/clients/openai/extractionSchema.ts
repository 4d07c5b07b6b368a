/**
 * Schema of the JSON object the model must return
 */

import { z } from "zod";

const nullableText = z.string().nullable().optional();

export const ExtractedJobSchema = z.object({
  title: nullableText,
  company: nullableText,
  aboutCompany: nullableText,
  location: nullableText,
  alternateLocations: z.array(z.string()).nullable().optional(),
  employmentType: nullableText,
  aboutJob: nullableText,
  qualifications: nullableText,
  benefits: nullableText,
  salary: nullableText,
  workEnvironment: nullableText,
});
