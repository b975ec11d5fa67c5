export class RepositoryNotDirectoryError extends Error {
  constructor(repoPath: string) {
    super(`Repository path is not a directory: ${repoPath}`);
    this.name = "RepositoryNotDirectoryError";
  }
}
