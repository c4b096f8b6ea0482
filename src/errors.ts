export class FairnessError extends Error {
  constructor(message: string, public code: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Raised for an unusable die set, binning or engine option, before any computation. */
export class ConfigurationError extends FairnessError {
  constructor(message: string) {
    super(message, "CONFIGURATION_ERROR");
  }
}
