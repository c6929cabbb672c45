import { GoHighLevelAdapter } from '../../src/services/crm/ghl.adapter';
import { CRMFactory } from '../../src/services/crm/crm.adapter';
import { ConfigurationError, HttpStatusError } from '../../src/utils/errors';

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

// Mock global fetch
const mockFetch = jest.fn();
global.fetch = mockFetch;

const BASE = 'https://services.leadconnectorhq.com';

describe('CRM Factory', () => {
  it('should create GoHighLevel adapter', () => {
    const adapter = CRMFactory.create('gohighlevel', {
      apiKey: 'test-key',
      locationId: 'loc-123',
    });
    expect(adapter).toBeInstanceOf(GoHighLevelAdapter);
  });

  it('should accept the short name', () => {
    expect(CRMFactory.create('ghl', { apiKey: 'test-key', locationId: 'loc-123' })).toBeInstanceOf(GoHighLevelAdapter);
  });

  it('should throw for unsupported CRM type', () => {
    expect(() => CRMFactory.create('salesforce', {})).toThrow('Unsupported CRM type: salesforce');
  });

  it('should require credentials', () => {
    expect(() => CRMFactory.create('ghl', { apiKey: 'test-key' })).toThrow(ConfigurationError);
  });
});

describe('GoHighLevelAdapter', () => {
  let adapter: GoHighLevelAdapter;

  beforeEach(() => {
    jest.clearAllMocks();
    adapter = new GoHighLevelAdapter({
      apiKey: 'test-api-key',
      locationId: 'loc-123',
    });
  });

  it('should search contacts by E.164 number', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      json: async () => ({ contact: { id: 'contact-789' } }),
    });

    const contactId = await adapter.findContact('5215512345678@s.whatsapp.net');

    expect(contactId).toBe('contact-789');
    const [url, options] = mockFetch.mock.calls[0];
    expect(url).toBe(`${BASE}/contacts/search/duplicate?locationId=loc-123&number=%2B5215512345678`);
    expect(options.method).toBe('GET');
    expect(options.headers['Authorization']).toBe('Bearer test-api-key');
    expect(options.headers['Version']).toBe('2021-07-28');
    expect(options.body).toBeUndefined();
  });

  it('should return null when no contact matches', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      json: async () => ({ contact: null }),
    });

    expect(await adapter.findContact('5215512345678')).toBeNull();
  });

  it('should create a lead when the contact is new', async () => {
    mockFetch
      .mockResolvedValueOnce({ ok: true, json: async () => ({ contact: null }) })
      .mockResolvedValueOnce({ ok: true, json: async () => ({ contact: { id: 'contact-new' } }) })
      .mockResolvedValueOnce({ ok: true, json: async () => ({ note: { id: 'note-1' } }) });

    const contactId = await adapter.upsertLead('5215512345678', 'Interested', 'Interested in: Tunland G9', {
      name: 'Laura',
      interest: 'Tunland G9',
    });

    expect(contactId).toBe('contact-new');
    expect(mockFetch).toHaveBeenCalledTimes(3);

    const [createUrl, createOptions] = mockFetch.mock.calls[1];
    expect(createUrl).toBe(`${BASE}/contacts/`);
    expect(createOptions.method).toBe('POST');
    expect(JSON.parse(createOptions.body)).toEqual({
      locationId: 'loc-123',
      phone: '+5215512345678',
      source: 'WhatsApp Sales Assistant',
      firstName: 'Laura',
      tags: ['funnel:interested'],
      customFields: { funnel_stage: 'Interested', vehicle_interest: 'Tunland G9' },
    });

    const [noteUrl, noteOptions] = mockFetch.mock.calls[2];
    expect(noteUrl).toBe(`${BASE}/contacts/contact-new/notes`);
    expect(JSON.parse(noteOptions.body)).toEqual({ body: '[Interested] Interested in: Tunland G9' });
  });

  it('should update the existing contact instead of creating a second one', async () => {
    mockFetch
      .mockResolvedValueOnce({ ok: true, json: async () => ({ contact: { id: 'contact-789' } }) })
      .mockResolvedValueOnce({ ok: true, json: async () => ({ contact: { id: 'contact-789' } }) })
      .mockResolvedValueOnce({ ok: true, json: async () => ({}) });

    const contactId = await adapter.upsertLead('5215512345678', 'Appointment', 'Appointment confirmed: lunes 10 AM', {
      appointment: 'lunes 10 AM',
    });

    expect(contactId).toBe('contact-789');
    const [updateUrl, updateOptions] = mockFetch.mock.calls[1];
    expect(updateUrl).toBe(`${BASE}/contacts/contact-789`);
    expect(updateOptions.method).toBe('PUT');
    expect(JSON.parse(updateOptions.body)).toEqual({
      tags: ['funnel:appointment'],
      customFields: { funnel_stage: 'Appointment', appointment: 'lunes 10 AM' },
    });
    expect(mockFetch.mock.calls[2][0]).toBe(`${BASE}/contacts/contact-789/notes`);
  });

  it('should surface throttling with the Retry-After delay', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: false,
      status: 429,
      text: async () => 'Too many requests',
      headers: { get: () => '2' },
    });

    const error = await adapter.findContact('5215512345678').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpStatusError);
    expect(error).toMatchObject({ status: 429, retryAfterMs: 2000, message: 'HTTP 429: Too many requests' });
  });

  it('should reject responses of the wrong shape', async () => {
    mockFetch.mockResolvedValueOnce({ ok: true, json: async () => ({ id: 'flat' }) });

    await expect(adapter.createContact({ phone: '5215512345678' })).rejects.toThrow();
  });
});
