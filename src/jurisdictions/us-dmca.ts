/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import {
  BaseJurisdictionProfile,
  BlockedPageCopy,
  ValidationMessages,
} from './base-profile.js';

const NOTICE_TEMPLATE = `
# DMCA Takedown Notice

## Required Information Under 17 U.S.C. § 512(c)(3)

### 1. Identification of Copyrighted Work
- **Title:** [Title of your copyrighted work]
- **Author:** [Author name]
- **Copyright Registration Number:** [If available]
- **Description:** [Detailed description of the copyrighted work]

### 2. Identification of Infringing Material
- **IPFS CID:** \`ipfs://...\`
- **Gateway URL:** \`https://gateway.example.com/ipfs/...\`
- **Description:** [How the material infringes your copyright]

### 3. Contact Information
- **Full Legal Name:** [Your name or company name]
- **Physical Address:** [Street address, city, state, ZIP]
- **Email Address:** [your@email.com]
- **Phone Number:** [Your phone number]

### 4. Good Faith Statement
*"I have a good faith belief that use of the copyrighted material described above in the manner complained of is not authorized by the copyright owner, its agent, or the law."*

☐ I agree to this statement

### 5. Accuracy Statement (Under Penalty of Perjury)
*"The information in this notification is accurate, and under penalty of perjury, I am the copyright owner or authorized to act on behalf of the owner of an exclusive right that is allegedly infringed."*

☐ I agree to this statement under penalty of perjury

### 6. Signature
- **Physical or Electronic Signature:** [Your signature]
- **Date:** [Date of submission]

---

**Important:** False claims may result in liability for damages, costs, and attorney's fees under 17 U.S.C. § 512(f).

**Response Time:** We will respond within 48 hours.
`;

const COUNTER_NOTICE_TEMPLATE = `
# DMCA Counter-Notice

## Under 17 U.S.C. § 512(g)

### 1. Identification of Removed Material
- **CID:** [The CID that was removed]
- **Original URL:** [Original gateway URL]
- **Date of Removal:** [When it was removed]

### 2. Your Contact Information
- **Name:** [Your full name]
- **Address:** [Your physical address]
- **Phone:** [Your phone number]
- **Email:** [Your email address]

### 3. Statement Under Penalty of Perjury
*"I swear, under penalty of perjury, that I have a good faith belief that the material was removed or disabled as a result of mistake or misidentification of the material to be removed or disabled."*

☐ I agree under penalty of perjury

### 4. Consent to Jurisdiction
*"I consent to the jurisdiction of Federal District Court for the judicial district in which my address is located, or if my address is outside of the United States, for any judicial district in which the service provider may be found, and I will accept service of process from the person who provided the original DMCA notice or an agent of such person."*

☐ I agree to this statement

### 5. Signature
- **Signature:** [Your signature]
- **Date:** [Date]

---

**Processing Time:** Content may be restored in 10-14 business days unless the original complainant files a court action.
`;

export class UsDmcaProfile extends BaseJurisdictionProfile {
  readonly countryCode = 'US';
  readonly lawName = 'DMCA (Digital Millennium Copyright Act)';
  readonly lawReference = '17 U.S.C. § 512';
  readonly requiredFields = [
    'copyright_owner',
    'contact_email',
    'contact_address',
    'contact_phone',
    'infringing_cid',
    'copyrighted_work_description',
    'good_faith_statement',
    'accuracy_statement',
    'signature',
  ];
  // "expeditious" removal under the safe harbor
  readonly slaHours = 48;
  readonly noticeTemplate = NOTICE_TEMPLATE;
  readonly counterNoticeTemplate = COUNTER_NOTICE_TEMPLATE;
  readonly defaultLanguage = 'en';

  protected readonly emailField = 'contact_email';
  protected readonly emailRequiresDot = true;
  protected readonly messages: ValidationMessages = {
    missingField: (field) => `Missing required field: ${field}`,
    invalidCid: 'Invalid IPFS CID format',
    invalidEmail: 'Invalid email address',
  };
  protected readonly attestations = {
    good_faith_statement: 'Good faith statement is required',
    accuracy_statement:
      'Accuracy statement under penalty of perjury is required',
  };
  protected readonly blockedPageCopy: Record<string, BlockedPageCopy> = {
    en: {
      title: '451 - Content Unavailable For Legal Reasons',
      message:
        'This content has been removed in response to a DMCA takedown notice.',
      law: '17 U.S.C. § 512',
      action:
        'If you believe this removal was in error, you may file a DMCA counter-notice.',
      link: '/copyright/counter-notice-template',
    },
  };

  getFooterHtml(): string {
    return `<div class="compliance-badge compliance-badge--us">
  DMCA Compliant Gateway (USA)<br>
  <a href="/copyright/report">Report Copyright Infringement</a><br>
  <small>Protected by 17 U.S.C. § 512 Safe Harbor provisions</small>
</div>`;
  }

  getTakedownReasons(): Readonly<Record<string, string>> {
    return {
      dmca: 'DMCA Takedown Notice',
      copyright: 'Copyright Infringement',
      trademark: 'Trademark Infringement',
    };
  }
}
