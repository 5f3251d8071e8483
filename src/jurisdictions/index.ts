/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { EuDsaProfile } from './eu-dsa.js';
import { FrDroitAuteurProfile } from './fr-droit-auteur.js';
import { PlPrawaAutorskieProfile } from './pl-prawa-autorskie.js';
import { JurisdictionProfile } from './types.js';
import { UsDmcaProfile } from './us-dmca.js';

export { JurisdictionRegistry } from './registry.js';
export type * from './types.js';

export function createDefaultProfiles(): JurisdictionProfile[] {
  return [
    new UsDmcaProfile(),
    new EuDsaProfile(),
    new PlPrawaAutorskieProfile(),
    new FrDroitAuteurProfile(),
  ];
}
