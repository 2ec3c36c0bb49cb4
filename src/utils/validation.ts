/**
 * Client-side checks that run before anything is sent to the backend.
 */

import type { UploadProfile } from '../types/analysis';
import type { ExerciseType } from '../types/exercise';

/**
 * - permissive: only a video and an exercise are required
 * - strict: the athlete's id, height and weight are required as well
 */
export type ValidationMode = 'permissive' | 'strict';

export type ValidationField =
  | 'video'
  | 'exercise'
  | 'userId'
  | 'height'
  | 'weight';

export interface ValidationIssue {
  field: ValidationField;
  message: string;
}

const isBlank = (value: string) => value.trim().length === 0;

export function validateUploadProfile(
  profile: UploadProfile,
  mode: ValidationMode
): ValidationIssue[] {
  if (mode === 'permissive') return [];

  const issues: ValidationIssue[] = [];
  if (isBlank(profile.userId)) {
    issues.push({ field: 'userId', message: 'Enter a user ID.' });
  }
  if (isBlank(profile.height)) {
    issues.push({ field: 'height', message: 'Enter your height.' });
  }
  if (isBlank(profile.weight)) {
    issues.push({ field: 'weight', message: 'Enter your weight.' });
  }
  return issues;
}

export interface SubmissionInput {
  hasVideo: boolean;
  exercise: ExerciseType | null;
  profile: UploadProfile;
  mode: ValidationMode;
}

/**
 * Everything that blocks an upload, in the order the form shows it.
 */
export function validateSubmission(input: SubmissionInput): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  if (!input.hasVideo) {
    issues.push({ field: 'video', message: 'Select a video to analyze.' });
  }
  if (input.exercise === null) {
    issues.push({ field: 'exercise', message: 'Select an exercise type.' });
  }
  return [...issues, ...validateUploadProfile(input.profile, input.mode)];
}

export function formatIssues(issues: ValidationIssue[]): string {
  return issues.map((issue) => issue.message).join(' ');
}

// ============================================
// Profile completion
// ============================================

export interface ProfileCompletionForm {
  username: string;
  weight: string;
  height: string;
  phone: string;
  dob: string;
  password: string;
  confirmPassword: string;
}

export type ProfileValidationResult =
  | { valid: true }
  | { valid: false; message: string };

export const FILL_ALL_FIELDS_MESSAGE = 'Please fill all fields.';
export const PASSWORD_MISMATCH_MESSAGE = 'Passwords do not match.';

/**
 * Rules the profile-completion wizard applies before it submits.
 */
export function validateProfileCompletion(
  form: ProfileCompletionForm
): ProfileValidationResult {
  const required = [
    form.username,
    form.weight,
    form.height,
    form.phone,
    form.dob,
    form.password,
  ];
  if (required.some(isBlank)) {
    return { valid: false, message: FILL_ALL_FIELDS_MESSAGE };
  }
  if (form.password !== form.confirmPassword) {
    return { valid: false, message: PASSWORD_MISMATCH_MESSAGE };
  }
  return { valid: true };
}
