export class ResultsFileParseError extends Error {
  constructor(filePath: string, message: string) {
    super(`Results file ${filePath} is not valid JSON: ${message}`);
    this.name = "ResultsFileParseError";
  }
}

export class ResultsFileFormatError extends Error {
  constructor(filePath: string) {
    super(`Results file ${filePath} must map scanner names to arrays of violations.`);
    this.name = "ResultsFileFormatError";
  }
}
