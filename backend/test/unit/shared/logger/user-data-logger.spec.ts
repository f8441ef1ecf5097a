import { describe, it, expect, vi } from 'vitest';
import { createUserDataLogger } from '../../../../src/shared/logger/user-data-logger';
import { captureTransport } from '../../../helpers/capture-stream';

const TIMESTAMP = '\\d{4}-\\d{2}-\\d{2}T\\d{2}:\\d{2}:\\d{2}\\.\\d{3}Z';

describe('createUserDataLogger', () => {
  it('renders a text line with label, level and timestamp, masking PII by default', async () => {
    const { transport, lines } = captureTransport();
    const logger = createUserDataLogger({ service: 'svc-test', transports: [transport] });

    logger.info('name=Ann;email=ann@example.com;phone=555-0100;ssn=111-22-3333;password=pw1;ip=10.0.0.1;');

    await vi.waitFor(() => expect(lines).toHaveLength(1));
    expect(lines[0]).toMatch(
      new RegExp(
        `^\\[svc-test\\] user_data INFO ${TIMESTAMP}: name=\\*\\*\\*;email=\\*\\*\\*;phone=\\*\\*\\*;ssn=\\*\\*\\*;password=\\*\\*\\*;ip=10\\.0\\.0\\.1;$`,
      ),
    );
  });

  it('masks only the fields it was given', async () => {
    const { transport, lines } = captureTransport();
    const logger = createUserDataLogger({
      service: 'svc-test',
      fields: ['email'],
      transports: [transport],
    });

    logger.warn('name=Ann;email=ann@example.com;');

    await vi.waitFor(() => expect(lines).toHaveLength(1));
    expect(lines[0]).toMatch(
      new RegExp(`^\\[svc-test\\] user_data WARN ${TIMESTAMP}: name=Ann;email=\\*\\*\\*;$`),
    );
  });
});
