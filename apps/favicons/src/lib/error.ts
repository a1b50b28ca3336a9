export class OrganizationsFileError extends Error {
  public filePath: string;

  constructor(filePath: string, cause?: unknown) {
    super(`Could not read organizations from ${filePath}`, { cause });
    this.name = "OrganizationsFileError";
    this.filePath = filePath;
  }
}
