/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import winston from 'winston';

import { reasonLabel } from './reason-labels.js';
import {
  BlockedPageText,
  JurisdictionProfile,
  JurisdictionSummary,
  NoticeFields,
  NoticeValidationResult,
} from './types.js';

const GENERIC_BLOCKED_PAGE = {
  title: '451 - Content Unavailable For Legal Reasons',
  message: 'This content has been blocked for legal reasons.',
  law: 'Applicable law',
};

/**
 * Holds every known jurisdiction profile and the one currently in force.
 * Country codes are matched case-insensitively.
 */
export class JurisdictionRegistry {
  private log: winston.Logger;
  private profiles = new Map<string, JurisdictionProfile>();
  private active: JurisdictionProfile | undefined;

  constructor({
    log,
    profiles,
    defaultCountry,
  }: {
    log: winston.Logger;
    profiles: readonly JurisdictionProfile[];
    defaultCountry?: string;
  }) {
    this.log = log.child({ class: this.constructor.name });

    for (const profile of profiles) {
      this.profiles.set(profile.countryCode.toUpperCase(), profile);
    }

    if (defaultCountry !== undefined && !this.setActive(defaultCountry)) {
      this.log.warn('Default jurisdiction is not registered', {
        defaultCountry,
      });
    }
  }

  /**
   * Switches the active profile. Unknown codes leave the current profile in
   * place and return false.
   */
  setActive(countryCode: string): boolean {
    const profile = this.get(countryCode);
    if (profile === undefined) {
      this.log.warn('Unknown jurisdiction requested', { countryCode });
      return false;
    }

    const previous = this.active?.countryCode;
    this.active = profile;
    this.log.info('Active jurisdiction set', {
      previous,
      countryCode: profile.countryCode,
      lawName: profile.lawName,
    });
    return true;
  }

  getActive(): JurisdictionProfile | undefined {
    return this.active;
  }

  get(countryCode: string): JurisdictionProfile | undefined {
    return this.profiles.get(countryCode.toUpperCase());
  }

  list(): JurisdictionSummary[] {
    return [...this.profiles.values()].map((profile) => ({
      countryCode: profile.countryCode,
      lawName: profile.lawName,
      lawReference: profile.lawReference,
      slaHours: profile.slaHours,
    }));
  }

  validateNotice(fields: NoticeFields): NoticeValidationResult {
    if (this.active === undefined) {
      return { valid: false, message: 'No jurisdiction profile active' };
    }
    return this.active.validateNotice(fields);
  }

  getBlockedPageText(reason: string, language?: string): BlockedPageText {
    if (this.active === undefined) {
      return {
        ...GENERIC_BLOCKED_PAGE,
        reason,
        reasonText: reasonLabel(reason, 'en'),
      };
    }
    return this.active.getBlockedPageText(reason, language);
  }
}
