import type { SourceLocation } from '../types';
import { TemplateError } from './TemplateError';
import { TemplateErrorCode } from './codes';

export type PathFailureReason = 'missing' | 'not-indexable' | 'out-of-range' | 'null-value';

/**
 * Details specific to path resolution errors.
 */
export interface PathResolutionDetails {
  /** The full dotted path of the token */
  path: string;
  /** The component that could not be resolved */
  component: string;
  /** Index of the failing component within the path */
  failedAtIndex: number;
  reason: PathFailureReason;
  [key: string]: unknown;
}

/**
 * A dotted path was found at its root but a later component could not be
 * resolved. A missing root is not an error; this is.
 */
export class PathResolutionError extends TemplateError {
  declare readonly details: PathResolutionDetails;

  constructor(location: SourceLocation, details: PathResolutionDetails) {
    super(
      `Cannot expand token '${details.path}', component '${details.component}' is missing or invalid`,
      location,
      {
        code: TemplateErrorCode.PATH_RESOLUTION_FAILED,
        details
      }
    );
  }
}
