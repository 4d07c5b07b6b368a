/**
 * Employers loading
 */

import * as fs from "fs";
import * as path from "path";
import type { Employer } from "@/types";
import { validateEmployersFile } from "@/utils/employersValidation";

/**
 * Load and validate the ordered employer list
 *
 * @param filePath - Path to the employers JSON file (relative to cwd or absolute)
 * @throws {Error} If the file cannot be read
 * @throws {SyntaxError} If JSON is malformed
 * @throws {EmployersValidationError} If validation fails
 */
export function loadEmployers(filePath: string): Employer[] {
  const resolved = path.resolve(process.cwd(), filePath);
  const jsonContent = fs.readFileSync(resolved, "utf-8");
  const raw: unknown = JSON.parse(jsonContent);
  return validateEmployersFile(raw);
}
