import fg from "fast-glob";

export interface DiscoverOptions {
  root: string;
  extensions: string[];
  exclude?: string[];
}

/**
 * Lists every file under `root` carrying one of `extensions`, one extension at a time.
 * Order within an extension is directory-walk order.
 */
export async function discoverFiles(options: DiscoverOptions): Promise<string[]> {
  const files: string[] = [];
  for (const extension of options.extensions) {
    const entries = await fg([`**/*${extension}`], {
      cwd: options.root,
      dot: true,
      onlyFiles: true,
      followSymbolicLinks: false,
      absolute: true,
      ignore: options.exclude ?? []
    });
    files.push(...entries);
  }

  return files;
}
