/** An error that carries the HTTP status it should be answered with. */
export class HttpError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends HttpError {
  constructor(message: string) {
    super(400, message);
  }
}

export class AuthError extends HttpError {
  constructor(message = "Authentication token is missing") {
    super(401, message);
  }
}

/** Malformed, expired or badly signed session token. */
export class InvalidTokenError extends AuthError {
  constructor(message = "Invalid authentication token") {
    super(message);
  }
}

export class ForbiddenError extends HttpError {
  constructor(message = "GM privileges required") {
    super(403, message);
  }
}

export class NotFoundError extends HttpError {
  constructor(message = "Not found") {
    super(404, message);
  }
}

export class ConflictError extends HttpError {
  constructor(message: string) {
    super(409, message);
  }
}

export class DuplicateUsernameError extends ConflictError {
  constructor(readonly username: string) {
    super(`Username '${username}' already exists`);
  }
}
