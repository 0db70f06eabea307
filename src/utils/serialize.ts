import type { StoredDocument } from '../db/documentStore';

export type WireRecord = { id: string } & Record<string, unknown>;

// Every document leaving the API goes through here: _id out, string id in.
export const toWire = (document: StoredDocument): WireRecord => {
  const { _id, ...fields } = document;
  return { ...fields, id: String(_id) };
};
