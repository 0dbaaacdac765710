export class FilterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FilterError";
  }
}

export class InvalidArgumentError extends FilterError {
  constructor(
    public readonly argument: "filters" | "root",
    message: string,
  ) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

export class DirectoryNotFoundError extends FilterError {
  constructor(public readonly directory: string) {
    super(`Not a directory: ${directory}`);
    this.name = "DirectoryNotFoundError";
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly source: string,
  ) {
    super(`${source}: ${message}`);
    this.name = "ConfigError";
  }
}
