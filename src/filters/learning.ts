/**
 * Filters of the learning subdomain: student accounts, enrollments,
 * certificates and page rendering.
 *
 * Each filter's terminating errors are exposed as static members, so a
 * step raises `new CourseEnrollmentStarted.PreventEnrollment(...)` and the
 * call site catches the same class.
 */

import { FilterError } from '../types/errors.js';
import type { ArgumentBag } from '../types/step.js';
import {
  ACCOUNT_SETTINGS_RENDER_STARTED,
  CERTIFICATE_CREATION_REQUESTED,
  CERTIFICATE_RENDER_STARTED,
  COURSE_ABOUT_PAGE_URL_REQUESTED,
  COURSE_ENROLLMENT_STARTED,
  COURSE_UNENROLLMENT_STARTED,
  DASHBOARD_RENDER_STARTED,
  STUDENT_LOGIN_REQUESTED,
  STUDENT_REGISTRATION_REQUESTED,
} from './names.js';
import { PublicFilter, bagAt } from './public-filter.js';
import {
  SENSITIVE_FORM_FIELDS,
  extractSensitiveData,
  restoreSensitiveData,
} from './sensitive-data.js';

// ---------------------------------------------------------------------------
// Shared terminating errors
// ---------------------------------------------------------------------------

/** Redirect the user instead of rendering the page. */
export class RedirectToPage extends FilterError {
  constructor(message: string, redirectTo = '') {
    super(message, { redirect_to: redirectTo });
    this.name = 'RedirectToPage';
  }
}

/** Stop rendering and return the given response instead. */
export class RenderCustomResponse extends FilterError {
  constructor(message: string, response: unknown = null) {
    super(message, { response });
    this.name = 'RenderCustomResponse';
  }

  get response(): unknown {
    return this.attributes['response'];
  }
}

/** Render a different template, with its own context, instead of the page. */
export class RenderAlternativeTemplate extends FilterError {
  constructor(
    message: string,
    details: { templateAttribute: string; template?: string; templateContext?: ArgumentBag | null },
  ) {
    super(message, {
      [details.templateAttribute]: details.template ?? '',
      template_context: details.templateContext ?? null,
    });
    this.name = 'RenderAlternativeTemplate';
  }
}

// ---------------------------------------------------------------------------
// Account settings
// ---------------------------------------------------------------------------

class RenderInvalidAccountSettings extends RenderAlternativeTemplate {
  constructor(message: string, accountSettingsTemplate = '', templateContext: ArgumentBag | null = null) {
    super(message, {
      templateAttribute: 'account_settings_template',
      template: accountSettingsTemplate,
      templateContext,
    });
    this.name = 'RenderInvalidAccountSettings';
  }
}

/** Runs before the account settings page renders. */
export class AccountSettingsRenderStarted extends PublicFilter {
  readonly filterType = ACCOUNT_SETTINGS_RENDER_STARTED;

  static readonly RedirectToPage = RedirectToPage;
  static readonly RenderInvalidAccountSettings = RenderInvalidAccountSettings;
  static readonly RenderCustomResponse = RenderCustomResponse;

  runFilter(context: ArgumentBag, templateName: string): { context: ArgumentBag; templateName: unknown } {
    const data = this.runPipeline({ context, template_name: templateName });
    return { context: bagAt(data, 'context', context), templateName: data['template_name'] };
  }
}

// ---------------------------------------------------------------------------
// Registration and login
// ---------------------------------------------------------------------------

class PreventRegistration extends FilterError {
  constructor(message: string, attributes: ArgumentBag = {}) {
    super(message, attributes);
    this.name = 'PreventRegistration';
  }
}

/**
 * Runs when a registration form is submitted. Password fields are held
 * back from the steps and restored on the returned form data.
 */
export class StudentRegistrationRequested extends PublicFilter {
  readonly filterType = STUDENT_REGISTRATION_REQUESTED;

  static readonly PreventRegistration = PreventRegistration;
  static readonly sensitiveFormData: readonly string[] = SENSITIVE_FORM_FIELDS;

  runFilter(formData: ArgumentBag): ArgumentBag {
    const { sensitive, remainder } = extractSensitiveData(
      formData,
      StudentRegistrationRequested.sensitiveFormData,
    );
    const data = this.runPipeline({ form_data: remainder });
    return restoreSensitiveData(bagAt(data, 'form_data', remainder), sensitive);
  }
}

class PreventLogin extends FilterError {
  constructor(
    message: string,
    details: { redirectTo?: string; errorCode?: string; context?: ArgumentBag | null } = {},
  ) {
    super(message, {
      redirect_to: details.redirectTo ?? '',
      error_code: details.errorCode ?? '',
      context: details.context ?? null,
    });
    this.name = 'PreventLogin';
  }

  get errorCode(): string {
    const value = this.attributes['error_code'];
    return typeof value === 'string' ? value : '';
  }
}

/** Runs when a user logs in, before the session is created. */
export class StudentLoginRequested extends PublicFilter {
  readonly filterType = STUDENT_LOGIN_REQUESTED;

  static readonly PreventLogin = PreventLogin;

  runFilter(user: unknown): unknown {
    return this.runPipeline({ user })['user'];
  }
}

// ---------------------------------------------------------------------------
// Enrollment
// ---------------------------------------------------------------------------

class PreventEnrollment extends FilterError {
  constructor(message: string, attributes: ArgumentBag = {}) {
    super(message, attributes);
    this.name = 'PreventEnrollment';
  }
}

/** Runs when a user starts enrolling in a course. */
export class CourseEnrollmentStarted extends PublicFilter {
  readonly filterType = COURSE_ENROLLMENT_STARTED;

  static readonly PreventEnrollment = PreventEnrollment;

  runFilter(
    user: unknown,
    courseKey: string,
    mode: string,
  ): { user: unknown; courseKey: unknown; mode: unknown } {
    const data = this.runPipeline({ user, course_key: courseKey, mode });
    return { user: data['user'], courseKey: data['course_key'], mode: data['mode'] };
  }
}

class PreventUnenrollment extends FilterError {
  constructor(message: string, attributes: ArgumentBag = {}) {
    super(message, attributes);
    this.name = 'PreventUnenrollment';
  }
}

/** Runs when a user starts leaving a course. */
export class CourseUnenrollmentStarted extends PublicFilter {
  readonly filterType = COURSE_UNENROLLMENT_STARTED;

  static readonly PreventUnenrollment = PreventUnenrollment;

  runFilter(enrollment: unknown): unknown {
    return this.runPipeline({ enrollment })['enrollment'];
  }
}

// ---------------------------------------------------------------------------
// Certificates
// ---------------------------------------------------------------------------

class PreventCertificateCreation extends FilterError {
  constructor(message: string, attributes: ArgumentBag = {}) {
    super(message, attributes);
    this.name = 'PreventCertificateCreation';
  }
}

/** Arguments of a certificate creation request. */
export interface CertificateRequest {
  user: unknown;
  courseKey: string;
  mode: string;
  status: string;
  grade: number;
  generationMode: string;
}

/** Runs before a certificate generation task is queued. */
export class CertificateCreationRequested extends PublicFilter {
  readonly filterType = CERTIFICATE_CREATION_REQUESTED;

  static readonly PreventCertificateCreation = PreventCertificateCreation;

  runFilter(request: CertificateRequest): Record<keyof CertificateRequest, unknown> {
    const data = this.runPipeline({
      user: request.user,
      course_key: request.courseKey,
      mode: request.mode,
      status: request.status,
      grade: request.grade,
      generation_mode: request.generationMode,
    });
    return {
      user: data['user'],
      courseKey: data['course_key'],
      mode: data['mode'],
      status: data['status'],
      grade: data['grade'],
      generationMode: data['generation_mode'],
    };
  }
}

class RenderAlternativeInvalidCertificate extends FilterError {
  constructor(message: string, templateName = '') {
    super(message, { template_name: templateName });
    this.name = 'RenderAlternativeInvalidCertificate';
  }
}

/** Runs before a web certificate renders. */
export class CertificateRenderStarted extends PublicFilter {
  readonly filterType = CERTIFICATE_RENDER_STARTED;

  static readonly RedirectToPage = RedirectToPage;
  static readonly RenderAlternativeInvalidCertificate = RenderAlternativeInvalidCertificate;
  static readonly RenderCustomResponse = RenderCustomResponse;

  runFilter(
    context: ArgumentBag,
    customTemplate: unknown,
  ): { context: ArgumentBag; customTemplate: unknown } {
    const data = this.runPipeline({ context, custom_template: customTemplate });
    return { context: bagAt(data, 'context', context), customTemplate: data['custom_template'] };
  }
}

// ---------------------------------------------------------------------------
// Dashboard and course about page
// ---------------------------------------------------------------------------

class RenderInvalidDashboard extends RenderAlternativeTemplate {
  constructor(message: string, dashboardTemplate = '', templateContext: ArgumentBag | null = null) {
    super(message, {
      templateAttribute: 'dashboard_template',
      template: dashboardTemplate,
      templateContext,
    });
    this.name = 'RenderInvalidDashboard';
  }
}

/** Runs before the student dashboard renders. */
export class DashboardRenderStarted extends PublicFilter {
  readonly filterType = DASHBOARD_RENDER_STARTED;

  static readonly RedirectToPage = RedirectToPage;
  static readonly RenderInvalidDashboard = RenderInvalidDashboard;
  static readonly RenderCustomResponse = RenderCustomResponse;

  runFilter(context: ArgumentBag, templateName: string): { context: ArgumentBag; templateName: unknown } {
    const data = this.runPipeline({ context, template_name: templateName });
    return { context: bagAt(data, 'context', context), templateName: data['template_name'] };
  }
}

/** Runs when the URL of a course about page is requested. */
export class CourseAboutPageURLRequested extends PublicFilter {
  readonly filterType = COURSE_ABOUT_PAGE_URL_REQUESTED;

  runFilter(url: string, org: string): { url: unknown; org: unknown } {
    const data = this.runPipeline({ url, org });
    return { url: data['url'], org: data['org'] };
  }
}
