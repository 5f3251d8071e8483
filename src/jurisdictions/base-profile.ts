/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { looksLikeCid } from '../lib/cid.js';
import { reasonLabel } from './reason-labels.js';
import {
  BlockedPageText,
  JurisdictionProfile,
  NoticeFields,
  NoticeValidationResult,
} from './types.js';

export type BlockedPageCopy = Omit<BlockedPageText, 'reason' | 'reasonText'>;

export interface ValidationMessages {
  missingField: (field: string) => string;
  invalidCid: string;
  invalidEmail: string;
}

export const CID_FIELD = 'infringing_cid';

export const VALID: NoticeValidationResult = { valid: true };

export function invalid(
  message: string,
  field?: string,
): NoticeValidationResult {
  return field === undefined
    ? { valid: false, message }
    : { valid: false, message, field };
}

/**
 * A submitted value counts as present when it is a non-blank string, `true`
 * or a number. HTML checkboxes arrive as "on".
 */
export function isPresent(value: unknown): boolean {
  if (typeof value === 'string') {
    return value.trim() !== '';
  }
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  return value === true;
}

const AFFIRMATIVE_VALUES = new Set(['on', 'true', 'yes', '1', 'checked']);

/** Attestation checkboxes must be explicitly ticked, not merely filled in. */
export function isAffirmed(value: unknown): boolean {
  if (typeof value === 'string') {
    return AFFIRMATIVE_VALUES.has(value.trim().toLowerCase());
  }
  return value === true || value === 1;
}

/**
 * Shared notice validation and block page lookup. Subclasses supply the
 * legal metadata, their localized copy and the attestations their regime
 * requires.
 *
 * Checks run in a fixed order and the first failure is reported: required
 * fields, CID shape, contact email, then each attestation.
 */
export abstract class BaseJurisdictionProfile implements JurisdictionProfile {
  abstract readonly countryCode: string;
  abstract readonly lawName: string;
  abstract readonly lawReference: string;
  abstract readonly requiredFields: readonly string[];
  abstract readonly slaHours: number;
  abstract readonly noticeTemplate: string;
  abstract readonly counterNoticeTemplate: string;
  abstract readonly defaultLanguage: string;

  protected abstract readonly emailField: string;
  protected abstract readonly messages: ValidationMessages;
  /** Attestation field to the message shown when it is not ticked. */
  protected abstract readonly attestations: Readonly<Record<string, string>>;
  protected abstract readonly blockedPageCopy: Readonly<
    Record<string, BlockedPageCopy>
  >;
  protected readonly emailRequiresDot: boolean = false;

  get languages(): readonly string[] {
    return Object.keys(this.blockedPageCopy);
  }

  validateNotice(fields: NoticeFields): NoticeValidationResult {
    for (const field of this.requiredFields) {
      if (!isPresent(fields[field])) {
        return invalid(this.messages.missingField(field), field);
      }
    }

    if (!looksLikeCid(fields[CID_FIELD])) {
      return invalid(this.messages.invalidCid, CID_FIELD);
    }

    const email = fields[this.emailField];
    if (
      typeof email !== 'string' ||
      !email.includes('@') ||
      (this.emailRequiresDot && !email.includes('.'))
    ) {
      return invalid(this.messages.invalidEmail, this.emailField);
    }

    for (const [field, message] of Object.entries(this.attestations)) {
      if (!isAffirmed(fields[field])) {
        return invalid(message, field);
      }
    }

    return VALID;
  }

  getBlockedPageText(reason: string, language?: string): BlockedPageText {
    const resolved =
      language !== undefined && Object.hasOwn(this.blockedPageCopy, language)
        ? language
        : this.defaultLanguage;

    return {
      ...this.blockedPageCopy[resolved],
      reason,
      reasonText: reasonLabel(reason, resolved),
    };
  }

  abstract getFooterHtml(): string;

  abstract getTakedownReasons(): Readonly<Record<string, string>>;

  formatNoticeResponse(referenceId: string): string {
    return [
      `Copyright Notice Received - ${this.lawName}`,
      '',
      `Reference: ${referenceId}`,
      `Jurisdiction: ${this.countryCode}`,
      `Response time: ${this.slaHours} hours`,
      '',
      `We have received your notice and will review it according to ${this.lawReference}.`,
    ].join('\n');
  }
}
