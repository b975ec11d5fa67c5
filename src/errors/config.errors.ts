export class ConfigFileParseError extends Error {
  constructor(configPath: string, message: string) {
    super(`Config file ${configPath} is not valid JSON: ${message}`);
    this.name = "ConfigFileParseError";
  }
}

export class ConfigInvalidScannersError extends Error {
  constructor() {
    super(
      "Invalid scanner registry. Set MCPSCAN_SCANNERS to a comma-separated list or results.scanners to a non-empty array of names in mcpscan.config.json."
    );
    this.name = "ConfigInvalidScannersError";
  }
}

export class ConfigUnsupportedLanguageError extends Error {
  constructor(language: string) {
    super(`Unsupported detection language "${language}". Use python or typescript.`);
    this.name = "ConfigUnsupportedLanguageError";
  }
}
