import { asWireRecord, readBoolean, readRecordList, readString } from './wire.js';

export interface Profile {
  readonly profileId: string;
  readonly profileName: string;
  readonly defaultProfile: boolean;
}

export interface AuthorisationPeriod {
  readonly id: string;
  readonly description: string;
}

export interface Authoriser {
  readonly authoriserId: string;
  readonly name: string;
}

/**
 * Multi-party sign-off rules for payments from a profile account
 */
export interface AuthorisationSetup {
  readonly numberOfAuthorisationRequired: string;
  readonly period: readonly AuthorisationPeriod[];
  readonly authorisersListA: readonly Authoriser[];
  readonly authorisersListB: readonly Authoriser[];
}

export function parseProfile(value: unknown): Profile {
  const data = asWireRecord(value);
  return {
    profileId: readString(data, 'profileId'),
    profileName: readString(data, 'profileName'),
    defaultProfile: readBoolean(data, 'defaultProfile'),
  };
}

function parseAuthoriser(data: Record<string, unknown>): Authoriser {
  return {
    authoriserId: readString(data, 'authoriserId'),
    name: readString(data, 'name'),
  };
}

export function parseAuthorisationSetup(value: unknown): AuthorisationSetup {
  const data = asWireRecord(value);
  return {
    numberOfAuthorisationRequired: readString(data, 'numberOfAuthorisationRequired'),
    period: readRecordList(data, 'period').map((item) => ({
      id: readString(item, 'id'),
      description: readString(item, 'description'),
    })),
    authorisersListA: readRecordList(data, 'authorisersListA').map(parseAuthoriser),
    authorisersListB: readRecordList(data, 'authorisersListB').map(parseAuthoriser),
  };
}
