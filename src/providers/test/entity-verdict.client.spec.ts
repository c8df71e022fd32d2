import { EntityVerdict } from '../../entity-risk/entities/entity-verdict.entity';
import { RiskLevel } from '../../screening/risk-level';
import { EntityVerdictClient } from '../entity-verdict.client';

const WINDOW = { start: '2024-06-15', end: '2025-06-15' };

describe('EntityVerdictClient', () => {
  const repository = { findOne: jest.fn() };
  const client = new EntityVerdictClient(repository);
  const verdict = Object.assign(new EntityVerdict(), {
    entityId: 'E-1',
    primaryName: 'Alpha Shipping',
    sanctionsLevel: RiskLevel.HIGH,
  });

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should find a party by entity id', async () => {
    repository.findOne.mockResolvedValueOnce(verdict);

    await expect(client.fetch('E-1', WINDOW)).resolves.toEqual({
      entityId: 'E-1',
      entityName: 'Alpha Shipping',
      sanctionsLevel: RiskLevel.HIGH,
    });
    expect(repository.findOne).toHaveBeenCalledTimes(1);
  });

  it('should fall back to the primary name', async () => {
    repository.findOne.mockResolvedValueOnce(null).mockResolvedValueOnce(verdict);

    await expect(client.fetch('Alpha Shipping', WINDOW)).resolves.toEqual({
      entityId: 'E-1',
      entityName: 'Alpha Shipping',
      sanctionsLevel: RiskLevel.HIGH,
    });
    expect(repository.findOne).toHaveBeenLastCalledWith({
      where: { primaryName: 'Alpha Shipping' },
      order: { entityId: 'ASC' },
    });
  });

  it('should resolve null for a party that was never assessed', async () => {
    repository.findOne.mockResolvedValue(null);
    await expect(client.fetch('Unknown Ltd', WINDOW)).resolves.toBeNull();
  });
});
