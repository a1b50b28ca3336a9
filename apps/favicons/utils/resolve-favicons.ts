/**
 * Favicon resolution script
 *
 * Reads the organization list and makes sure every organization with a
 * website has an icon in the favicon directory. Icons already on disk are
 * reused unless --refetch is given.
 *
 * Usage:
 *   npx tsx utils/resolve-favicons.ts [--csv=<path>] [--out=<dir>] [--refetch]
 *
 * Options:
 *   --csv        Organization CSV with Org and Website columns
 *                (default: data/organizations.csv)
 *   --out        Favicon directory (default: FAVICON_CACHE_DIR)
 *   --refetch    Ignore cached icons and fetch everything again
 *
 * Writes favicons.json into the favicon directory, mapping each
 * organization to its icon filename and rendered icon cell.
 */

import { writeFile } from "node:fs/promises";
import path from "node:path";
import { config } from "../src/config";
import { getFlagValue } from "../src/lib/args";
import { OrganizationsFileError } from "../src/lib/error";
import { logger } from "../src/lib/logger";
import { OrganizationRef, resolveFavicons } from "../src/scraper/favicons";
import { ensureCacheDir } from "../src/scraper/favicons/lib/cache";
import { buildFaviconManifest } from "../src/services/manifest";
import { readOrganizationsFile } from "../src/services/organizations";

const args = process.argv.slice(2);
const refetch = args.includes("--refetch");
const csvPath = getFlagValue(args, "csv") || "data/organizations.csv";
const cacheDir = getFlagValue(args, "out") || config.FAVICON_CACHE_DIR;

async function main() {
  console.log("=== Favicon Resolution ===");
  console.log(`Organizations: ${csvPath}`);
  console.log(`Favicon directory: ${cacheDir}`);
  console.log(`Mode: ${refetch ? "REFETCH" : "CACHED"}`);
  console.log("");

  let organizations: OrganizationRef[];
  try {
    organizations = await readOrganizationsFile(csvPath);
  } catch (error) {
    if (error instanceof OrganizationsFileError) {
      console.error(`ERROR: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }

  console.log(`Found ${organizations.length} organizations`);

  const { results, summary } = await resolveFavicons(organizations, {
    cacheDir,
    forceRefetch: refetch,
  });

  const manifest = buildFaviconManifest(results, path.basename(cacheDir));

  await ensureCacheDir(cacheDir);
  const manifestPath = path.join(cacheDir, "favicons.json");
  await writeFile(manifestPath, JSON.stringify(manifest, null, 2) + "\n");

  console.log("");
  console.log("=== Summary ===");
  console.log(`Cached:   ${summary.cache}`);
  console.log(`Fetched:  ${summary.network}`);
  console.log(`Missing:  ${summary.missing}`);
  console.log(`Skipped:  ${summary.skipped}`);
  console.log(`Manifest: ${manifestPath}`);
}

main().catch(error => {
  logger.error("Favicon resolution failed", { error });
  process.exit(1);
});
