import { FunnelStage } from './conversation';

export interface LeadDetails {
  name?: string;
  interest?: string;
  appointment?: string;
}

export interface ContactData {
  firstName?: string;
  phone: string;
  tags?: string[];
  metadata?: Record<string, unknown>;
}

export interface CRMConfig {
  apiKey?: string;
  locationId?: string;
  source?: string;
}

export interface CRMAdapter {
  /**
   * Create or update the lead for a conversation identity and attach a note.
   * Repeated calls for the same identity update one record.
   */
  upsertLead(conversationIdentity: string, stage: FunnelStage, note: string, details?: LeadDetails): Promise<string>;
  findContact(phone: string): Promise<string | null>;
}
