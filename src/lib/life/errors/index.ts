/**
 * Base class for errors raised by the life simulation core
 */
export abstract class LifeError extends Error {
  abstract readonly code: string;
  public readonly baseMessage: string;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.baseMessage = message;

    if (context && Object.keys(context).length > 0) {
      let detailedMessage = `${message}\n\nContext:`;
      for (const [key, value] of Object.entries(context)) {
        detailedMessage += `\n  ${key}: ${String(value)}`;
      }
      this.message = detailedMessage;
    }

    this.name = this.constructor.name;
  }
}

/**
 * Thrown when a coordinate outside the board reaches the core.
 * Input handlers validate against the fixed bounds, so this is a bug in the caller.
 */
export class GridBoundsError extends LifeError {
  readonly code = "GRID_OUT_OF_BOUNDS";

  constructor(col: number, row: number, width: number, height: number) {
    super(
      `Cell (${col}, ${row}) out of bounds for ${width}x${height} grid`,
      { col, row, width, height }
    );
  }
}

export class LifeConfigError extends LifeError {
  readonly code = "INVALID_CONFIG";

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context);
  }
}

export class LifeEngineError extends LifeError {
  constructor(
    message: string,
    public readonly code: "ENGINE_DESTROYED" | "ENGINE_STATE",
    context?: Record<string, unknown>
  ) {
    super(message, context);
  }
}

export class ConsumerRegistrationError extends LifeError {
  constructor(
    message: string,
    public readonly code:
      | "CONSUMER_ALREADY_REGISTERED"
      | "SIGNAL_NOT_CONSUMABLE",
    context?: Record<string, unknown>
  ) {
    super(message, context);
  }
}
