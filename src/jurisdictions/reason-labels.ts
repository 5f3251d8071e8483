/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

const REASON_LABELS: Record<string, Record<string, string>> = {
  en: {
    malware: 'Malware detected',
    phishing: 'Phishing attempt',
    dmca: 'Copyright infringement (DMCA)',
    copyright: 'Copyright infringement',
    policy_violation: 'Terms of service violation',
    'ipfs-official-denylist': 'Blocked by the public IPFS denylist',
  },
  pl: {
    malware: 'Wykryto złośliwe oprogramowanie',
    phishing: 'Próba wyłudzenia danych (phishing)',
    dmca: 'Naruszenie praw autorskich (DMCA)',
    copyright: 'Naruszenie praw autorskich',
    policy_violation: 'Naruszenie regulaminu',
    'ipfs-official-denylist': 'Zablokowane przez oficjalną listę IPFS',
  },
  fr: {
    malware: 'Logiciel malveillant détecté',
    phishing: "Tentative d'hameçonnage",
    dmca: "Violation du droit d'auteur (DMCA)",
    copyright: "Violation du droit d'auteur",
    policy_violation: "Violation des conditions d'utilisation",
    'ipfs-official-denylist': 'Bloqué par la liste officielle IPFS',
  },
};

/** Human-readable label for a reason tag; unknown tags are returned as-is. */
export function reasonLabel(reason: string, language: string): string {
  return REASON_LABELS[language]?.[reason] ?? reason;
}
