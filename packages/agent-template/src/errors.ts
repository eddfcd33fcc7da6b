/**
 * Base class for errors raised by agent-fleet itself
 *
 * Errors coming from the scheduler are never wrapped in one of these; they
 * reach the caller unchanged.
 */
export class AgentFleetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A template or cloud setting that can never work (empty image, bad region)
 */
export class ConfigurationError extends AgentFleetError {}

/**
 * A compact mount or volume list that does not decode
 */
export class FormatError extends AgentFleetError {
  constructor(
    message: string,
    /** The offending segment, as written */
    public readonly segment: string,
    /** Zero-based position of the segment in the list */
    public readonly position: number
  ) {
    super(message);
  }
}

/**
 * The scheduler accepted the call but returned nothing usable
 */
export class RegistrationError extends AgentFleetError {}
