/**
 * France Travail API payload mappers
 *
 * Two steps: decodeOffer() narrows an untrusted JSON item to the typed
 * FranceTravailOffer shape, mapFranceTravailOffer() converts it to a
 * posting candidate for validatePosting().
 */

import type {
  FranceTravailOffer,
  PostingCandidate,
  PostingContract,
  PostingLocation,
} from "@/types";
import { isNonEmptyString, isRecord } from "@/utils/guards";
import {
  departmentFromPostalCode,
  type RegionIndex,
} from "@/utils/geo/departments";

function str(value: unknown): string | undefined {
  return isNonEmptyString(value) ? value : undefined;
}

/**
 * Keep the known fields of an API item that have the expected type
 *
 * @returns null when the item is not an object
 */
export function decodeOffer(value: unknown): FranceTravailOffer | null {
  if (!isRecord(value)) {
    return null;
  }

  const offer: FranceTravailOffer = {
    id: typeof value.id === "number" ? String(value.id) : str(value.id),
    intitule: str(value.intitule),
    description: str(value.description),
    dateCreation: str(value.dateCreation),
    dateActualisation: str(value.dateActualisation),
    typeContrat: str(value.typeContrat),
    typeContratLibelle: str(value.typeContratLibelle),
    natureContrat: str(value.natureContrat),
    experienceLibelle: str(value.experienceLibelle),
    dureeTravailLibelle: str(value.dureeTravailLibelle),
    romeCode: str(value.romeCode),
  };

  if (typeof value.alternance === "boolean") {
    offer.alternance = value.alternance;
  }

  const lieu = value.lieuTravail;
  if (isRecord(lieu)) {
    offer.lieuTravail = {
      libelle: str(lieu.libelle),
      codePostal: str(lieu.codePostal),
      commune: str(lieu.commune),
      ...(typeof lieu.latitude === "number" && { latitude: lieu.latitude }),
      ...(typeof lieu.longitude === "number" && { longitude: lieu.longitude }),
    };
  }

  const entreprise = value.entreprise;
  if (isRecord(entreprise)) {
    offer.entreprise = { nom: str(entreprise.nom), url: str(entreprise.url) };
  }

  const origine = value.origineOffre;
  if (isRecord(origine)) {
    offer.origineOffre = {
      origine: str(origine.origine),
      urlOrigine: str(origine.urlOrigine),
    };
  }

  return offer;
}

/**
 * Department code from the "54 - Nancy" prefix of lieuTravail.libelle,
 * used when the postal code is missing
 */
function departmentFromLabel(label: string | undefined): string | undefined {
  const match = label?.match(/^\s*(\d{2,3}|2[AB])\s*-/i);
  return match ? match[1].toUpperCase() : undefined;
}

function mapLocation(
  raw: FranceTravailOffer,
  regions: RegionIndex,
): PostingLocation {
  const lieu = raw.lieuTravail;
  const location: PostingLocation = {};
  if (!lieu) {
    return location;
  }

  if (lieu.libelle) location.label = lieu.libelle;
  if (lieu.codePostal) location.postalCode = lieu.codePostal;
  if (lieu.commune) location.commune = lieu.commune;

  const department =
    departmentFromPostalCode(lieu.codePostal) ??
    departmentFromLabel(lieu.libelle);
  if (department) {
    location.departmentCode = department;
    const region = regions.get(department);
    if (region) {
      location.regionCode = region.code;
      location.regionLabel = region.label;
    }
  }

  return location;
}

function mapContract(raw: FranceTravailOffer): PostingContract {
  const contract: PostingContract = {};
  if (raw.typeContrat) contract.type = raw.typeContrat;
  if (raw.typeContratLibelle) contract.typeLabel = raw.typeContratLibelle;
  if (raw.natureContrat) contract.nature = raw.natureContrat;
  if (raw.experienceLibelle) contract.experienceLabel = raw.experienceLibelle;
  if (raw.dureeTravailLibelle) {
    contract.workingHoursLabel = raw.dureeTravailLibelle;
  }
  if (raw.alternance !== undefined) contract.alternance = raw.alternance;
  return contract;
}

/**
 * Map a France Travail offer to a posting candidate
 *
 * Missing identifying fields are passed through as null; validatePosting()
 * rejects them.
 */
export function mapFranceTravailOffer(
  raw: FranceTravailOffer,
  regions: RegionIndex,
): PostingCandidate {
  return {
    externalId: raw.id ?? null,
    title: raw.intitule ?? null,
    description: raw.description ?? "",
    createdAt: raw.dateCreation ?? null,
    updatedAt: raw.dateActualisation ?? null,
    companyName: raw.entreprise?.nom ?? null,
    location: mapLocation(raw, regions),
    contract: mapContract(raw),
    romeCode: raw.romeCode ?? null,
    url: raw.origineOffre?.urlOrigine ?? null,
  };
}
