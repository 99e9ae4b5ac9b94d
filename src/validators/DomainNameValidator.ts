/**
 * Individual validation error
 */
export interface IValidationError {
  /** Error code */
  code: 'EMPTY_INPUT' | 'INVALID_LENGTH' | 'INVALID_CHARACTERS' | 'INVALID_FORMAT' | 'MISSING_TLD';
  /** Error message */
  message: string;
  /** Offending value */
  value: string;
}

export interface IValidationResult {
  isValid: boolean;
  /** Trimmed, lowercased domain */
  sanitizedDomain: string;
  errors: IValidationError[];
  /** First error message, when invalid */
  errorMessage?: string;
}

/**
 * Validator for full host names read from the domain source list
 *
 * Validation Rules:
 * - Total length: at most 253 characters, at least two labels
 * - Labels: 1-63 characters, alphanumeric and hyphens only
 * - No leading or trailing hyphen in any label
 */
export class DomainNameValidator {
  private static readonly MAX_DOMAIN_LENGTH = 253;
  private static readonly MAX_LABEL_LENGTH = 63;
  private static readonly VALID_LABEL_CHARS = /^[a-z0-9-]+$/;
  private static readonly HYPHEN_EDGE = /^-|-$/;

  /**
   * Validate a domain name
   * @param domain - Domain name to validate
   * @returns Validation result with detailed error information
   */
  validate(domain: string): IValidationResult {
    const sanitizedDomain = this.sanitize(domain);
    const errors: IValidationError[] = [];

    if (!sanitizedDomain) {
      errors.push({ code: 'EMPTY_INPUT', message: 'Domain name cannot be empty', value: sanitizedDomain });
      return this.toResult(sanitizedDomain, errors);
    }

    if (sanitizedDomain.length > DomainNameValidator.MAX_DOMAIN_LENGTH) {
      errors.push({
        code: 'INVALID_LENGTH',
        message: `Domain name must be no more than ${DomainNameValidator.MAX_DOMAIN_LENGTH} characters long`,
        value: sanitizedDomain
      });
    }

    const labels = sanitizedDomain.split('.');
    if (labels.length < 2) {
      errors.push({ code: 'MISSING_TLD', message: 'Domain name must include a top-level domain', value: sanitizedDomain });
    }

    for (const label of labels) {
      if (label.length === 0 || label.length > DomainNameValidator.MAX_LABEL_LENGTH) {
        errors.push({
          code: 'INVALID_LENGTH',
          message: `Each label must be 1-${DomainNameValidator.MAX_LABEL_LENGTH} characters long`,
          value: label
        });
      } else if (!DomainNameValidator.VALID_LABEL_CHARS.test(label)) {
        errors.push({
          code: 'INVALID_CHARACTERS',
          message: 'Domain name can only contain letters, numbers, hyphens and dots',
          value: label
        });
      } else if (DomainNameValidator.HYPHEN_EDGE.test(label)) {
        errors.push({
          code: 'INVALID_FORMAT',
          message: 'Domain labels cannot start or end with a hyphen',
          value: label
        });
      }
    }

    return this.toResult(sanitizedDomain, errors);
  }

  /**
   * Normalize raw input: trim and lowercase
   */
  sanitize(input: string): string {
    return typeof input === 'string' ? input.trim().toLowerCase() : '';
  }

  private toResult(sanitizedDomain: string, errors: IValidationError[]): IValidationResult {
    const firstError = errors[0];
    return {
      isValid: errors.length === 0,
      sanitizedDomain,
      errors,
      ...(firstError && { errorMessage: firstError.message })
    };
  }
}
