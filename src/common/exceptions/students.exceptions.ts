import {
  BadRequestException,
  ConflictException,
  InternalServerErrorException,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';

/** The database could not be reached, at startup or when an operation opens its connection. */
export class ConnectionException extends ServiceUnavailableException {
  constructor(readonly diagnostic: string, cause?: unknown) {
    super(`Could not connect to database: ${diagnostic}`, { cause });
  }
}

/** Malformed operator input, rejected before the store is contacted. */
export class InvalidInputException extends BadRequestException {
  constructor(message: string) {
    super(message);
  }
}

export class DuplicateEmailException extends ConflictException {
  constructor(cause?: unknown) {
    super('That email is already in use. Please use a different email.', { cause });
  }
}

/** An update or delete matched no row. */
export class StudentNotFoundException extends NotFoundException {
  constructor() {
    super('No student found with that ID.');
  }
}

export class StoreException extends InternalServerErrorException {
  constructor(
    readonly action: string,
    readonly diagnostic: string,
    cause?: unknown,
  ) {
    super(`${action}: ${diagnostic}`, { cause });
  }
}
