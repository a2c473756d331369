import { HttpException, HttpStatus } from '@nestjs/common';

export type ErrorKind =
  | 'NotFound'
  | 'Unauthorized'
  | 'QuotaExceeded'
  | 'DuplicateResource'
  | 'LastOwner'
  | 'ResourceInUse'
  | 'InvalidInput'
  | 'Internal';

export type ResourceKind =
  | 'workspace'
  | 'project'
  | 'connection'
  | 'member';

const RESOURCE_LABELS: Record<ResourceKind, string> = {
  workspace: 'Workspace',
  project: 'Project',
  connection: 'Connection',
  member: 'Member',
};

export interface DomainErrorBody {
  statusCode: number;
  kind: ErrorKind;
  message: string;
}

/**
 * Base class of every domain failure. The response body carries the
 * machine-readable `kind` next to the HTTP status.
 */
export abstract class DomainException extends HttpException {
  protected constructor(
    readonly kind: ErrorKind,
    message: string,
    status: HttpStatus,
  ) {
    const body: DomainErrorBody = { statusCode: status, kind, message };
    super(body, status);
  }
}

export class ResourceNotFoundException extends DomainException {
  constructor(readonly resource: ResourceKind) {
    super('NotFound', `${RESOURCE_LABELS[resource]} not found`, HttpStatus.NOT_FOUND);
  }
}

export class AccessDeniedException extends DomainException {
  constructor(message = 'Insufficient permissions for this workspace') {
    super('Unauthorized', message, HttpStatus.FORBIDDEN);
  }
}

export class QuotaExceededException extends DomainException {
  constructor(
    readonly resource: ResourceKind,
    readonly limit: number,
  ) {
    super(
      'QuotaExceeded',
      `${RESOURCE_LABELS[resource]} quota of ${limit} reached`,
      HttpStatus.FORBIDDEN,
    );
  }
}

export class DuplicateResourceException extends DomainException {
  constructor(
    readonly resource: ResourceKind,
    message = `${RESOURCE_LABELS[resource]} already exists`,
  ) {
    super('DuplicateResource', message, HttpStatus.CONFLICT);
  }
}

export class LastOwnerException extends DomainException {
  constructor() {
    super(
      'LastOwner',
      'A workspace must keep at least one owner',
      HttpStatus.CONFLICT,
    );
  }
}

export class ResourceInUseException extends DomainException {
  constructor(
    readonly resource: ResourceKind,
    dependents: string,
    readonly count: number,
  ) {
    super(
      'ResourceInUse',
      `Cannot delete ${resource} with ${count} active ${dependents}`,
      HttpStatus.CONFLICT,
    );
  }
}

export class InvalidInputException extends DomainException {
  constructor(message: string) {
    super('InvalidInput', message, HttpStatus.BAD_REQUEST);
  }
}
