export * from './names.js';
export { PublicFilter, bagAt } from './public-filter.js';
export {
  SENSITIVE_FORM_FIELDS,
  extractSensitiveData,
  restoreSensitiveData,
  type SensitiveSplit,
} from './sensitive-data.js';
export {
  RedirectToPage,
  RenderCustomResponse,
  RenderAlternativeTemplate,
  AccountSettingsRenderStarted,
  StudentRegistrationRequested,
  StudentLoginRequested,
  CourseEnrollmentStarted,
  CourseUnenrollmentStarted,
  CertificateCreationRequested,
  CertificateRenderStarted,
  DashboardRenderStarted,
  CourseAboutPageURLRequested,
  type CertificateRequest,
} from './learning.js';
export { SessionJWTCreationRequested } from './authentication.js';
export { LMSPageURLRequested } from './content-authoring.js';
