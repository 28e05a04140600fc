/**
 * Token Vault and Block Context Tests
 */

import { InMemoryTokenVault } from '../src/token-vault';
import { ManualBlockContext } from '../src/block-context';
import { InsufficientBalanceError } from '../src/errors';
import { ALICE, BOB, WETH } from './fixtures';

describe('InMemoryTokenVault', () => {
  it('should move balances between accounts', () => {
    const vault = new InMemoryTokenVault();
    vault.mint(WETH, ALICE, 10n);
    vault.transfer(WETH, ALICE, BOB, 4n);

    expect(vault.balanceOf(WETH, ALICE)).toBe(6n);
    expect(vault.balanceOf(WETH, BOB.toLowerCase())).toBe(4n);
  });

  it('should reject transfers beyond the balance', () => {
    const vault = new InMemoryTokenVault();
    vault.mint(WETH, ALICE, 1n);

    expect(() => vault.transfer(WETH, ALICE, BOB, 2n)).toThrow(InsufficientBalanceError);
    expect(vault.balanceOf(WETH, ALICE)).toBe(1n);
  });

  it('should reject negative amounts', () => {
    const vault = new InMemoryTokenVault();
    expect(() => vault.mint(WETH, ALICE, -1n)).toThrow(RangeError);
    expect(() => vault.transfer(WETH, ALICE, BOB, -1n)).toThrow(RangeError);
  });

  it('should restore balances on rollback', () => {
    const vault = new InMemoryTokenVault();
    vault.mint(WETH, ALICE, 10n);
    const rollback = vault.checkpoint();
    vault.transfer(WETH, ALICE, BOB, 10n);
    rollback();

    expect(vault.balanceOf(WETH, ALICE)).toBe(10n);
    expect(vault.balanceOf(WETH, BOB)).toBe(0n);
  });
});

describe('ManualBlockContext', () => {
  it('should advance block number and timestamp together', () => {
    const block = new ManualBlockContext({ blockNumber: 10, timestamp: 1000, blockTime: 2, gasPrice: 5n });
    block.mine(3);
    expect(block.getBlockNumber()).toBe(13);
    expect(block.getTimestamp()).toBe(1006);

    block.mineTo(20);
    expect(block.getBlockNumber()).toBe(20);
    expect(block.getTimestamp()).toBe(1020);
    expect(block.getGasPrice()).toBe(5n);
  });

  it('should not move backwards', () => {
    const block = new ManualBlockContext({ blockNumber: 10 });
    expect(() => block.mineTo(9)).toThrow(RangeError);
  });
});
