/**
 * Filter type identifiers.
 *
 * Format: `org.platform.<subdomain>.<subject>.<action>.v<major>`. Published
 * identifiers never change; a new argument contract gets a new major.
 */

export const ACCOUNT_SETTINGS_RENDER_STARTED = 'org.platform.learning.student.settings.render.started.v1';
export const STUDENT_REGISTRATION_REQUESTED = 'org.platform.learning.student.registration.requested.v1';
export const STUDENT_LOGIN_REQUESTED = 'org.platform.learning.student.login.requested.v1';
export const COURSE_ENROLLMENT_STARTED = 'org.platform.learning.course.enrollment.started.v1';
export const COURSE_UNENROLLMENT_STARTED = 'org.platform.learning.course.unenrollment.started.v1';
export const CERTIFICATE_CREATION_REQUESTED = 'org.platform.learning.certificate.creation.requested.v1';
export const CERTIFICATE_RENDER_STARTED = 'org.platform.learning.certificate.render.started.v1';
export const DASHBOARD_RENDER_STARTED = 'org.platform.learning.dashboard.render.started.v1';
export const COURSE_ABOUT_PAGE_URL_REQUESTED = 'org.platform.learning.course_about.page.url.requested.v1';
export const SESSION_JWT_CREATION_REQUESTED = 'org.platform.authentication.session.jwt.creation.requested.v1';
export const LMS_PAGE_URL_REQUESTED = 'org.platform.content_authoring.lms.page.url.requested.v1';

/** Pattern every filter type identifier follows. */
export const FILTER_TYPE_PATTERN = /^org\.[a-z0-9_]+(\.[a-z0-9_]+){2,}\.v[1-9][0-9]*$/;

/** Whether a string is a well-formed filter type identifier. */
export function isFilterType(value: string): boolean {
  return FILTER_TYPE_PATTERN.test(value);
}
