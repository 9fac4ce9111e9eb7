export class LaunchpadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnrecognizedSystemLabelError extends LaunchpadError {
  readonly systemLabel: string;

  constructor(systemLabel: string) {
    super(`Unrecognized system label: ${systemLabel}`);
    this.systemLabel = systemLabel;
  }
}

export class UnknownCodenameError extends LaunchpadError {
  readonly systemYear: string;

  constructor(systemLabel: string, systemYear: string) {
    super(`No Ubuntu codename for year "${systemYear}" (system ${systemLabel})`);
    this.systemYear = systemYear;
  }
}

export class UnknownBoardSystemCombinationError extends LaunchpadError {
  readonly board: string;
  readonly systemLabel: string;

  constructor(board: string, systemLabel: string) {
    super(`Unsupported board/system combination: ${board}/${systemLabel}`);
    this.board = board;
    this.systemLabel = systemLabel;
  }
}

/** Any non-2xx answer from the Launchpad API. */
export class RemoteRequestError extends LaunchpadError {
  readonly statusCode: number;
  readonly body: string;
  readonly method: string;
  readonly url: string;

  constructor(statusCode: number, body: string, method: string, url: string) {
    super(`${method} ${url} failed (${statusCode}): ${body}`);
    this.statusCode = statusCode;
    this.body = body;
    this.method = method;
    this.url = url;
  }
}

export class NotFoundError extends LaunchpadError {
  readonly kind: string;
  readonly key: string;

  constructor(kind: string, key: string) {
    super(`${kind} not found: ${key}`);
    this.kind = kind;
    this.key = key;
  }
}
