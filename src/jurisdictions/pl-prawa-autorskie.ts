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
# Zgłoszenie naruszenia praw autorskich

## Ustawa o prawie autorskim i prawach pokrewnych (Polska)

### 1. Dane zgłaszającego
- **Imię i nazwisko / Nazwa podmiotu:** [Twoje dane]
- **Adres:** [Ulica, kod, miasto]
- **Email:** [twoj@email.pl]
- **Telefon:** [Numer telefonu]

### 2. Opis utworu chronionego
- **Tytuł utworu:** [Tytuł]
- **Szczegółowy opis:** [Opis utworu]

### 3. Wskazanie naruszenia
- **CID IPFS:** \`ipfs://...\`
- **URL:** \`https://gateway.example.com/ipfs/...\`

### 4. Prawa osobiste (Art. 16)
*"Oświadczam, że zgłaszana treść narusza autorskie prawa osobiste twórcy."*

☐ Potwierdzam naruszenie praw osobistych

### 5. Uzasadnienie
[Szczegółowe wyjaśnienie, dlaczego uważasz, że doszło do naruszenia]

### 6. Oświadczenie
*"Oświadczam, że podane informacje są prawdziwe i działam w dobrej wierze."*

☐ Potwierdzam prawdziwość oświadczenia

### 7. Podpis
- **Podpis:** [Podpis elektroniczny lub własnoręczny]
- **Data:** [Data]

---

- **Prawa osobiste** są niezbywalne i nieograniczone w czasie (Art. 16).
- **Odpowiedzialność karna:** Art. 233 § 1 Kodeksu karnego.
- **Czas reakcji:** 72 godziny
`;

const COUNTER_NOTICE_TEMPLATE = `
# Sprzeciw wobec usunięcia treści

### 1. Twoje dane
- **Imię i nazwisko:** [Twoje dane]
- **Email:** [email@domena.pl]

### 2. Treść, której dotyczy sprzeciw
- **CID usuniętej treści:** [CID]
- **Data usunięcia:** [Data]
- **Numer referencyjny:** [Numer z powiadomienia]

### 3. Uzasadnienie sprzeciwu
- ☐ Użytek osobisty (Art. 23)
- ☐ Prawo cytatu (Art. 29)
- ☐ Parodia (Art. 29¹)
- ☐ Utwór w domenie publicznej
- ☐ Inne: [Określ podstawę prawną]

---

**Czas rozpatrzenia:** 7 dni roboczych
`;

/** Polish Copyright and Related Rights Act. */
export class PlPrawaAutorskieProfile extends BaseJurisdictionProfile {
  readonly countryCode = 'PL';
  readonly lawName = 'Ustawa o prawie autorskim i prawach pokrewnych';
  readonly lawReference = 'Dz.U. 1994 nr 24 poz. 83 z późn. zm.';
  readonly requiredFields = [
    'complainant_name',
    'contact_address',
    'contact_email',
    'contact_phone',
    'work_description',
    'infringing_cid',
    'justification',
    'personal_rights_statement',
    'good_faith_statement',
    'signature',
  ];
  readonly slaHours = 72;
  readonly noticeTemplate = NOTICE_TEMPLATE;
  readonly counterNoticeTemplate = COUNTER_NOTICE_TEMPLATE;
  readonly defaultLanguage = 'pl';

  protected readonly emailField = 'contact_email';
  protected readonly emailRequiresDot = true;
  protected readonly messages: ValidationMessages = {
    missingField: (field) => `Brak wymaganego pola: ${field}`,
    invalidCid: 'Nieprawidłowy format CID IPFS',
    invalidEmail: 'Nieprawidłowy adres email',
  };
  protected readonly attestations = {
    personal_rights_statement:
      'Wymagane jest oświadczenie o naruszeniu praw osobistych',
    good_faith_statement:
      'Wymagane jest oświadczenie o działaniu w dobrej wierze',
  };
  protected readonly blockedPageCopy: Record<string, BlockedPageCopy> = {
    pl: {
      title: '451 - Treść niedostępna z przyczyn prawnych',
      message:
        'Ta treść została zablokowana z powodu naruszenia polskiego prawa autorskiego.',
      law: 'Ustawa o prawie autorskim i prawach pokrewnych (Dz.U. 1994 nr 24 poz. 83)',
      action:
        'Jeśli uważasz, że usunięcie było nieuzasadnione, możesz złożyć sprzeciw.',
      link: '/copyright/counter-notice-template',
      note: 'Prawa osobiste twórcy są niezbywalne i nieograniczone w czasie (Art. 16)',
    },
    en: {
      title: '451 - Content Unavailable For Legal Reasons',
      message:
        'This content has been blocked for infringing Polish copyright law.',
      law: 'Act on Copyright and Related Rights (Journal of Laws 1994 No. 24 item 83)',
      action:
        'If you believe this removal was unjustified, you may file an objection.',
      link: '/copyright/counter-notice-template',
      note: "An author's personal rights are inalienable and unlimited in time (Art. 16)",
    },
  };

  getFooterHtml(): string {
    return `<div class="compliance-badge compliance-badge--pl">
  Zgodność z polskim prawem autorskim<br>
  <a href="/copyright/report">Zgłoś naruszenie praw autorskich</a><br>
  <small>Ustawa o prawie autorskim i prawach pokrewnych (Dz.U. 1994 nr 24 poz. 83)</small>
</div>`;
  }

  getTakedownReasons(): Readonly<Record<string, string>> {
    return {
      naruszenie_praw_autorskich: 'Naruszenie praw autorskich',
      naruszenie_praw_osobistych: 'Naruszenie praw osobistych twórcy',
      naruszenie_praw_pokrewnych: 'Naruszenie praw pokrewnych',
      plagiat: 'Plagiat',
    };
  }

  formatNoticeResponse(referenceId: string): string {
    return [
      `Zgłoszenie przyjęte - ${this.lawName}`,
      '',
      `Numer referencyjny: ${referenceId}`,
      `Jurysdykcja: ${this.countryCode}`,
      `Czas odpowiedzi: ${this.slaHours} godzin`,
      '',
      `Zgłoszenie zostanie rozpatrzone zgodnie z ustawą (${this.lawReference}).`,
    ].join('\n');
  }
}
