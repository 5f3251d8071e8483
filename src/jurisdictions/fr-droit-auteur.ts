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
# Notification de violation du droit d'auteur

## Code de la propriété intellectuelle (France)

### 1. Identification de l'auteur
- **Nom de l'auteur:** [Votre nom]
- **Qualité:** ☐ Auteur ☐ Ayant droit ☐ Mandataire
- **Adresse:** [Votre adresse postale]
- **Email:** [votre@email.fr]

### 2. Description de l'œuvre protégée
- **Titre de l'œuvre:** [Titre]
- **Nature de l'œuvre:** [Livre, musique, image, vidéo, logiciel, etc.]
- **Description détaillée:** [Description de l'œuvre]

### 3. Localisation du contenu contrefaisant
- **CID IPFS:** \`ipfs://...\`
- **URL:** \`https://gateway.example.com/ipfs/...\`

### 4. Droits patrimoniaux (Article L111-1)
*"Je suis titulaire des droits patrimoniaux sur cette œuvre, notamment les droits de reproduction et de représentation."*

☐ Je confirme être titulaire des droits patrimoniaux

### 5. Droits moraux (Article L121-1)
*"Je déclare que le contenu signalé porte atteinte à mes droits moraux sur l'œuvre."*

☐ Je confirme l'atteinte aux droits moraux

### 6. Déclaration de bonne foi
*"J'atteste sur l'honneur que les informations fournies sont exactes et que je suis bien titulaire des droits invoqués ou mandaté pour agir au nom du titulaire."*

☐ J'atteste de la véracité de ces informations

### 7. Signature
- **Signature:** [Signature électronique ou manuscrite]
- **Date:** [Date]
- **Lieu:** [Lieu]

---

- **Droits moraux:** le droit moral est perpétuel, inaliénable et imprescriptible (Article L121-1).
- **Fausse déclaration:** Article 226-10 du Code pénal.
- **Délai de traitement:** 72 heures
`;

const COUNTER_NOTICE_TEMPLATE = `
# Contestation de retrait - Droit d'auteur français

### 1. Vos informations
- **Nom:** [Votre nom]
- **Adresse:** [Votre adresse]
- **Email:** [votre@email.fr]

### 2. Contenu concerné
- **CID retiré:** [CID IPFS]
- **Date du retrait:** [Date]
- **Référence:** [Numéro de référence du retrait]

### 3. Motifs de contestation
- ☐ Exception de courte citation (Article L122-5)
- ☐ Exception pédagogique (Article L122-5)
- ☐ Parodie, pastiche, caricature (Article L122-5)
- ☐ Vous êtes l'auteur ou ayant droit
- ☐ Contenu dans le domaine public
- ☐ Autre: [Précisez]

### 4. Déclaration
*"J'atteste sur l'honneur de la véracité des informations communiquées et avoir un intérêt légitime à la publication de ce contenu."*

☐ J'atteste

---

**Délai de traitement:** 7 jours ouvrés

**Recours:** le tribunal judiciaire compétent.
`;

/**
 * French authors' rights. Unlike the DMCA, moral rights stand apart from
 * economic rights and both must be asserted.
 */
export class FrDroitAuteurProfile extends BaseJurisdictionProfile {
  readonly countryCode = 'FR';
  readonly lawName = "Droit d'auteur (CPI)";
  readonly lawReference =
    'Code de la propriété intellectuelle (Articles L111-1 à L343-7)';
  readonly requiredFields = [
    'author_name',
    'contact_email',
    'contact_address',
    'infringing_cid',
    'work_description',
    'moral_rights_statement',
    'economic_rights_statement',
    'good_faith_statement',
    'signature',
  ];
  readonly slaHours = 72;
  readonly noticeTemplate = NOTICE_TEMPLATE;
  readonly counterNoticeTemplate = COUNTER_NOTICE_TEMPLATE;
  readonly defaultLanguage = 'fr';

  protected readonly emailField = 'contact_email';
  protected readonly messages: ValidationMessages = {
    missingField: (field) => `Champ requis manquant: ${field}`,
    invalidCid: 'Format CID IPFS invalide',
    invalidEmail: 'Adresse email invalide',
  };
  protected readonly attestations = {
    moral_rights_statement:
      'La déclaration sur les droits moraux est requise (spécificité du droit français)',
    economic_rights_statement:
      'La déclaration sur les droits patrimoniaux est requise',
    good_faith_statement: "L'attestation sur l'honneur est requise",
  };
  protected readonly blockedPageCopy: Record<string, BlockedPageCopy> = {
    fr: {
      title: '451 - Contenu indisponible pour des raisons légales',
      message:
        "Ce contenu a été bloqué en raison d'une violation du droit d'auteur français.",
      law: 'Code de la propriété intellectuelle',
      action:
        'Si vous pensez que ce retrait est erroné, vous pouvez contester la décision.',
      link: '/copyright/counter-notice-template',
      note: 'Le droit moral français est perpétuel et inaliénable (Article L121-1 CPI)',
    },
    en: {
      title: '451 - Content Unavailable For Legal Reasons',
      message:
        'This content has been blocked for infringing French copyright law.',
      law: 'French Intellectual Property Code',
      action:
        'If you believe this removal was in error, you may contest the decision.',
      link: '/copyright/counter-notice-template',
      note: "French moral rights are perpetual and inalienable (Article L121-1 CPI)",
    },
  };

  getFooterHtml(): string {
    return `<div class="compliance-badge compliance-badge--fr">
  Conformité Droit d'auteur français<br>
  <a href="/copyright/report">Signaler une violation</a><br>
  <small>Code de la propriété intellectuelle - Articles L111-1 à L343-7</small>
</div>`;
  }

  getTakedownReasons(): Readonly<Record<string, string>> {
    return {
      droit_auteur: "Violation du droit d'auteur",
      droit_moral: 'Atteinte aux droits moraux',
      contrefacon: 'Contrefaçon',
      droit_voisin: 'Violation des droits voisins',
    };
  }

  formatNoticeResponse(referenceId: string): string {
    return [
      `Notification reçue - ${this.lawName}`,
      '',
      `Référence: ${referenceId}`,
      `Juridiction: ${this.countryCode}`,
      `Délai de réponse: ${this.slaHours} heures`,
      '',
      `Votre notification sera examinée conformément au ${this.lawReference}.`,
    ].join('\n');
  }
}
