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
# DSA Notice and Action Mechanism

## Article 16 Requirements - Notification of Illegal Content

### 1. Complainant Information
- **Full Name or Company Name:** [Your name/company]
- **Email Address:** [your@email.com]
- **Phone Number (optional):** [Your phone]

### 2. Description of Illegal Content
- **IPFS CID:** \`ipfs://...\`
- **Gateway URL:** \`https://gateway.example.com/ipfs/...\`
- **Legal Basis:** [Which law/regulation is violated]
- **Explanation:** [Detailed explanation why this content is illegal]

### 3. Statement of Good Faith
*"I confirm that I have a good faith belief that the information and allegations in this notice are accurate and complete."*

☐ I agree to this statement

---

## Your Rights Under DSA

- **Article 20:** Right to complain about content moderation decisions
- **Article 17:** We will provide a Statement of Reasons for our decision
- **Transparency:** All takedown decisions are logged

**Response Time:** 24 hours for illegal content

**Appeal:** If you disagree with our decision, you can file a complaint within 6 months.
`;

const COUNTER_NOTICE_TEMPLATE = `
# DSA Complaint (Article 20)

## Right to Complain About Content Moderation Decisions

### 1. Your Information
- **Name:** [Your name]
- **Email:** [your@email.com]
- **Reference ID:** [ID from takedown notice]

### 2. Content Reference
- **CID:** [The blocked CID]
- **Date of Removal:** [When it was blocked]
- **Original Decision:** [Copy of the Statement of Reasons you received]

### 3. Grounds for Complaint
[Explain why you believe the removal was unjustified or the decision was incorrect]

### 4. Supporting Evidence
[Attach any evidence supporting your complaint]

---

**Processing Time:** We will review your complaint within 7 days and provide a Statement of Reasons for our final decision.

**Further Appeal:** If unsatisfied, you may submit the dispute to a certified out-of-court dispute settlement body.
`;

/** Notice-and-action under the Digital Services Act. */
export class EuDsaProfile extends BaseJurisdictionProfile {
  readonly countryCode = 'EU';
  readonly lawName = 'DSA (Digital Services Act)';
  readonly lawReference = 'Regulation (EU) 2022/2065';
  readonly requiredFields = [
    'complainant_name',
    'complainant_email',
    'infringing_cid',
    'illegal_content_explanation',
    'good_faith_statement',
  ];
  readonly slaHours = 24;
  readonly noticeTemplate = NOTICE_TEMPLATE;
  readonly counterNoticeTemplate = COUNTER_NOTICE_TEMPLATE;
  readonly defaultLanguage = 'en';

  protected readonly emailField = 'complainant_email';
  protected readonly messages: ValidationMessages = {
    missingField: (field) => `Missing required field: ${field}`,
    invalidCid: 'Invalid IPFS CID format',
    invalidEmail: 'Invalid email address',
  };
  protected readonly attestations = {
    good_faith_statement: 'Statement of good faith must be confirmed',
  };
  protected readonly blockedPageCopy: Record<string, BlockedPageCopy> = {
    en: {
      title: '451 - Content Unavailable For Legal Reasons',
      message:
        'This content has been blocked under the Digital Services Act (DSA).',
      law: 'Regulation (EU) 2022/2065',
      action:
        'If you believe this removal was incorrect, you may file a complaint.',
      link: '/copyright/counter-notice-template',
    },
    pl: {
      title: '451 - Treść niedostępna z przyczyn prawnych',
      message:
        'Ta treść została zablokowana zgodnie z Digital Services Act (DSA).',
      law: 'Rozporządzenie (UE) 2022/2065',
      action: 'Jeśli uważasz, że usunięcie było błędne, możesz złożyć skargę.',
      link: '/copyright/counter-notice-template',
    },
    fr: {
      title: '451 - Contenu indisponible pour des raisons légales',
      message:
        'Ce contenu a été bloqué en application du règlement sur les services numériques (DSA).',
      law: 'Règlement (UE) 2022/2065',
      action:
        'Si vous pensez que ce retrait est erroné, vous pouvez déposer une réclamation.',
      link: '/copyright/counter-notice-template',
    },
  };

  getFooterHtml(): string {
    return `<div class="compliance-badge compliance-badge--eu">
  DSA Compliant Gateway (European Union)<br>
  <a href="/copyright/report">Report Illegal Content</a> |
  <a href="/copyright/counter-notice-template">File Complaint</a><br>
  <small>Regulation (EU) 2022/2065 compliant</small>
</div>`;
  }

  getTakedownReasons(): Readonly<Record<string, string>> {
    return {
      copyright: 'Copyright Infringement',
      illegal_content: 'Illegal Content (DSA)',
      hate_speech: 'Hate Speech',
      csam: 'Child Sexual Abuse Material',
      terrorism: 'Terrorist Content',
    };
  }
}
