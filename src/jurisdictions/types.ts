/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

export type NoticeFields = Readonly<Record<string, unknown>>;

export type NoticeValidationResult =
  | { valid: true }
  | { valid: false; message: string; field?: string };

export interface BlockedPageText {
  title: string;
  message: string;
  reason: string;
  reasonText: string;
  law: string;
  action?: string;
  link?: string;
  note?: string;
}

export interface JurisdictionSummary {
  countryCode: string;
  lawName: string;
  lawReference: string;
  slaHours: number;
}

/**
 * Capability set every compliance regime provides. Profiles are immutable;
 * which one is in force is decided by the registry.
 */
export interface JurisdictionProfile {
  readonly countryCode: string;
  readonly lawName: string;
  readonly lawReference: string;
  /** Submission fields, in the order they are checked. */
  readonly requiredFields: readonly string[];
  readonly slaHours: number;
  readonly noticeTemplate: string;
  readonly counterNoticeTemplate: string;
  readonly defaultLanguage: string;
  readonly languages: readonly string[];

  validateNotice(fields: NoticeFields): NoticeValidationResult;
  getBlockedPageText(reason: string, language?: string): BlockedPageText;
  getFooterHtml(): string;
  getTakedownReasons(): Readonly<Record<string, string>>;
  formatNoticeResponse(referenceId: string): string;
}
