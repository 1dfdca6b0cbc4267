import {
  FOLLOW_UP_FALLBACK,
  answerFollowUp,
  buildFollowUpPrompt,
  requestFollowUp,
} from '../../services/followUp.service';
import { acmeRecord, fakeLlm } from '../helpers/fakes';

describe('buildFollowUpPrompt', () => {
  test('includes company, industry, services and the verbatim question', () => {
    const prompt = buildFollowUpPrompt(acmeRecord(), 'What is their annual revenue?');

    expect(prompt).toContain('Company: Acme Corp\nIndustry: Software\nServices: Consulting');
    expect(prompt).toContain('Question:\nWhat is their annual revenue?\n');
    expect(prompt).toContain('clearly state assumptions');
  });

  test('leaves personal contact details out of the prompt', () => {
    const prompt = buildFollowUpPrompt(acmeRecord(), 'Who are their competitors?');

    expect(prompt).not.toContain('John Doe');
    expect(prompt).not.toContain('john@acme.com');
  });
});

describe('requestFollowUp', () => {
  test('asks for free text with the follow-up timeout and no temperature', async () => {
    const { llm, complete } = fakeLlm({ success: true, data: 'About 50 employees.' });

    await requestFollowUp(llm, acmeRecord(), 'How big are they?');

    const request = complete.mock.calls[0][0];
    expect(request.timeoutMs).toBe(15000);
    expect(request.temperature).toBeUndefined();
    expect(request.messages).toHaveLength(1);
    expect(request.messages[0].role).toBe('user');
  });
});

describe('answerFollowUp', () => {
  test('returns the model answer', async () => {
    const { llm } = fakeLlm({ success: true, data: 'Estimated revenue is $5M (assumption: 50 staff).' });

    expect(await answerFollowUp(llm, acmeRecord(), 'Revenue?')).toBe('Estimated revenue is $5M (assumption: 50 staff).');
  });

  test.each([
    ['a timeout', 'timeout' as const],
    ['an HTTP error', 'http_error' as const],
    ['an empty response', 'empty_response' as const],
  ])('returns the fixed fallback after %s', async (_label, reason) => {
    const { llm } = fakeLlm({ success: false, error: { reason, message: 'failed' } });

    expect(await answerFollowUp(llm, acmeRecord(), 'Anything?')).toBe(FOLLOW_UP_FALLBACK);
  });

  test('fallback text does not depend on the question', async () => {
    const { llm } = fakeLlm(
      { success: false, error: { reason: 'network', message: 'down' } },
      { success: false, error: { reason: 'network', message: 'down' } }
    );

    const first = await answerFollowUp(llm, acmeRecord(), 'Revenue?');
    const second = await answerFollowUp(llm, acmeRecord(), '');

    expect(first).toBe('Unable to fetch information right now.');
    expect(second).toBe(first);
  });
});
