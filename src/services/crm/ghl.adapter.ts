import { z } from 'zod';
import { CRMAdapter, CRMConfig, ContactData, LeadDetails } from '../../types/crm';
import { FunnelStage } from '../../types/conversation';
import { logger } from '../../utils/logger';
import { ConfigurationError, HttpStatusError } from '../../utils/errors';
import { parseRetryAfter } from '../retry.service';
import { toE164 } from '../../utils/phone';

const GHL_BASE_URL = 'https://services.leadconnectorhq.com';

const contactResponse = z.object({ contact: z.object({ id: z.string() }) });
const duplicateResponse = z.object({ contact: z.object({ id: z.string() }).nullable().optional() });
const noteResponse = z.object({ note: z.object({ id: z.string() }).optional() }).passthrough();

/**
 * GoHighLevel contacts API. One attempt per call: retry and backoff belong to
 * the caller's RetryExecutor, which reads the HttpStatusError this throws.
 */
export class GoHighLevelAdapter implements CRMAdapter {
  private apiKey: string;
  private locationId: string;
  private source: string;

  constructor(config: CRMConfig, private readonly baseUrl: string = GHL_BASE_URL) {
    if (!config.apiKey || !config.locationId) {
      throw new ConfigurationError(['GHL_API_KEY and GHL_LOCATION_ID are required for the GoHighLevel CRM']);
    }
    this.apiKey = config.apiKey;
    this.locationId = config.locationId;
    this.source = config.source ?? 'WhatsApp Sales Assistant';
  }

  private async request<T>(
    method: string,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body?: Record<string, unknown>
  ): Promise<T> {
    const res = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers: {
        'Authorization': `Bearer ${this.apiKey}`,
        'Content-Type': 'application/json',
        'Version': '2021-07-28',
      },
      body: body ? JSON.stringify(body) : undefined,
    });

    if (!res.ok) {
      const errorBody = await res.text();
      throw new HttpStatusError(res.status, errorBody, parseRetryAfter(res.headers.get('retry-after')));
    }

    return schema.parse(await res.json());
  }

  async findContact(phone: string): Promise<string | null> {
    const params = new URLSearchParams({ locationId: this.locationId, number: toE164(phone) });
    const result = await this.request('GET', `/contacts/search/duplicate?${params.toString()}`, duplicateResponse);
    return result.contact?.id ?? null;
  }

  async createContact(contact: ContactData): Promise<string> {
    logger.info('GHL creating contact', { phone: contact.phone });

    const payload: Record<string, unknown> = {
      locationId: this.locationId,
      phone: toE164(contact.phone),
      source: this.source,
    };
    if (contact.firstName) payload.firstName = contact.firstName;
    if (contact.tags) payload.tags = contact.tags;
    if (contact.metadata) payload.customFields = contact.metadata;

    const result = await this.request('POST', '/contacts/', contactResponse, payload);
    logger.info('GHL contact created', { contactId: result.contact.id });
    return result.contact.id;
  }

  async updateContact(crmContactId: string, updates: Partial<ContactData>): Promise<void> {
    const payload: Record<string, unknown> = {};
    if (updates.firstName) payload.firstName = updates.firstName;
    if (updates.tags) payload.tags = updates.tags;
    if (updates.metadata) payload.customFields = updates.metadata;

    await this.request('PUT', `/contacts/${crmContactId}`, contactResponse, payload);
    logger.info('GHL contact updated', { crmContactId });
  }

  async addNote(crmContactId: string, body: string): Promise<void> {
    await this.request('POST', `/contacts/${crmContactId}/notes`, noteResponse, { body });
  }

  async upsertLead(
    conversationIdentity: string,
    stage: FunnelStage,
    note: string,
    details: LeadDetails = {}
  ): Promise<string> {
    const fields: Partial<ContactData> = {
      firstName: details.name,
      tags: [`funnel:${stage.toLowerCase()}`],
      metadata: {
        funnel_stage: stage,
        ...(details.interest ? { vehicle_interest: details.interest } : {}),
        ...(details.appointment ? { appointment: details.appointment } : {}),
      },
    };

    let contactId = await this.findContact(conversationIdentity);
    if (contactId) {
      await this.updateContact(contactId, fields);
    } else {
      contactId = await this.createContact({ ...fields, phone: conversationIdentity });
    }

    await this.addNote(contactId, `[${stage}] ${note}`);
    logger.info('GHL lead synced', { contactId, stage });
    return contactId;
  }
}
