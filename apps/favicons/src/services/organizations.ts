import { parse } from "csv-parse/sync";
import { readFile } from "node:fs/promises";
import { z } from "zod";
import { OrganizationsFileError } from "../lib/error";
import type { OrganizationRef } from "../scraper/favicons";

const organizationRow = z
  .object({
    Org: z.string().optional(),
    Website: z.string().optional(),
  })
  .passthrough();

/**
 * Read organizations from CSV text with `Org` and `Website` columns.
 * Rows without an organization name are dropped; every other column is
 * ignored.
 */
export function loadOrganizations(csvText: string): OrganizationRef[] {
  const rows: unknown[] = parse(csvText, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
    bom: true,
  });

  const organizations: OrganizationRef[] = [];
  for (const raw of rows) {
    const row = organizationRow.parse(raw);
    const name = (row.Org ?? "").trim();
    if (name === "") {
      continue;
    }
    organizations.push({
      name,
      websiteURL: (row.Website ?? "").trim(),
    });
  }

  return organizations;
}

export async function readOrganizationsFile(
  filePath: string,
): Promise<OrganizationRef[]> {
  let csvText: string;
  try {
    csvText = await readFile(filePath, "utf8");
  } catch (error) {
    throw new OrganizationsFileError(filePath, error);
  }

  try {
    return loadOrganizations(csvText);
  } catch (error) {
    throw new OrganizationsFileError(filePath, error);
  }
}
