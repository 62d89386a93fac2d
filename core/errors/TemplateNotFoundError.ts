import { QuireError, ErrorSeverity } from './QuireError';
import { TemplateErrorCode } from './codes';

export class TemplateNotFoundError extends QuireError {
  public readonly templateName: string;
  public readonly filePath: string;

  constructor(templateName: string, filePath: string, cause?: unknown) {
    super(`Template '${templateName}' not found at ${filePath}`, {
      code: TemplateErrorCode.TEMPLATE_NOT_FOUND,
      severity: ErrorSeverity.Fatal,
      details: { templateName, filePath },
      cause
    });
    this.templateName = templateName;
    this.filePath = filePath;
  }
}
