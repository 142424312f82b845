/**
 * API Types - shapes exchanged with the journal backend
 */

// Session returned by anonymous sign-in
export interface AuthSession {
  userId: string;
  token: string;
  anonymous: boolean;
}

// Journal Entry
export interface JournalEntry {
  id: string;
  content: string;
  moods: string[];
  dateCreated: string;
}

export interface CreateEntryInput {
  content: string;
  moods: string[];
}

