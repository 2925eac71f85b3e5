export type ArchiveFormat = "WACZ";

export function mimeTypeForArchiveFormat(format: ArchiveFormat): string {
  switch (format) {
    case "WACZ":
      return "application/wacz";
  }
}

export function extensionForArchiveFormat(format: ArchiveFormat): string {
  return format.toLowerCase();
}
