/**
 * Apache rules for serving pre-compressed files
 *
 * Tells Apache (with `AllowOverride` on) to send gzipped chunk and JSON files
 * as-is with `Content-Encoding: gzip` instead of compressing them again.
 */

export const HTACCESS_FILE = ".htaccess";

export const PRECOMPRESSED_EXTENSIONS = [".txt.gz", ".jsonz", ".txtz"] as const;

function escapeExtension(extension: string): string {
  return extension.replace(/\./g, "\\.");
}

/**
 * Render the .htaccess body for the given extensions
 *
 * @example
 * ```typescript
 * precompressionHtaccess([".txt.gz"]);
 * // contains `SetEnvIf Request_URI "(\.txt\.gz)$" no-gzip dont-vary`
 * ```
 */
export function precompressionHtaccess(
  extensions: readonly string[] = PRECOMPRESSED_EXTENSIONS
): string {
  const pattern = `(${extensions.map(escapeExtension).join("|")})$`;
  return [
    "# Serve pre-compressed reference sequence files with Content-Encoding: gzip.",
    "# Requires AllowOverride FileInfo (or All) for this directory.",
    "<IfModule mod_gzip.c>",
    `    mod_gzip_item_exclude "${pattern}"`,
    "</IfModule>",
    "<IfModule setenvif.c>",
    `    SetEnvIf Request_URI "${pattern}" no-gzip dont-vary`,
    "</IfModule>",
    "<IfModule mod_headers.c>",
    `    <FilesMatch "${pattern}">`,
    "        Header onsuccess set Content-Encoding gzip",
    "    </FilesMatch>",
    "</IfModule>",
    "",
  ].join("\n");
}
