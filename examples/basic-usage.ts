/**
 * Basic Usage Example
 * Walks through pools, swaps, flash sessions and commit-reveal against an in-memory vault
 */

import { ethers } from 'ethers';
import {
  PoolManager,
  InMemoryTokenVault,
  ManualBlockContext,
  ConstantProductStrategy,
  OracleAnchoredStrategy,
  StaticDataBridge,
  computeCommitment,
  encodeMarking,
  encodeTraderProtection,
  NO_PROTECTION,
  AmmError,
  loadConfigFromEnv,
} from '../src';

// Made-up asset and account addresses
const TOKENS = {
  WETH: '0x1111111111111111111111111111111111111111',
  USDC: '0x2222222222222222222222222222222222222222',
  DAI: '0x3333333333333333333333333333333333333333',
};

const ACCOUNTS = {
  alice: '0x1000000000000000000000000000000000000001',
  bob: '0x1000000000000000000000000000000000000002',
};

const STRATEGIES = {
  constantProduct: '0x9000000000000000000000000000000000000001',
  oracle: '0x9000000000000000000000000000000000000002',
};

async function main() {
  const vault = new InMemoryTokenVault();
  const block = new ManualBlockContext({ blockNumber: 1_000, timestamp: Math.floor(Date.now() / 1000) });
  const manager = new PoolManager({ vault, block, config: loadConfigFromEnv() });

  const constantProduct = manager.registerStrategy(STRATEGIES.constantProduct, new ConstantProductStrategy());
  const oracle = manager.registerStrategy(STRATEGIES.oracle, new OracleAnchoredStrategy());
  manager.setDefaultBridge(1, StaticDataBridge.price('weth-usdc', ethers.parseEther('2000'), block.getTimestamp()));

  const { alice, bob } = ACCOUNTS;
  vault.mint(TOKENS.WETH, alice, ethers.parseEther('3000'));
  vault.mint(TOKENS.USDC, alice, ethers.parseEther('5000000'));
  vault.mint(TOKENS.DAI, alice, ethers.parseEther('1000000'));
  vault.mint(TOKENS.WETH, bob, ethers.parseEther('10'));

  console.log('=== Pooled AMM Engine ===\n');
  console.log('Configuration:', manager.config.getConfig());
  console.log();

  // Example 1: Provide liquidity
  console.log('--- Example 1: Provide Liquidity ---');
  const deposit = await manager.addLiquidity({
    sender: alice,
    assetA: TOKENS.WETH,
    assetB: TOKENS.USDC,
    strategy: constantProduct,
    marking: 0,
    amountA: ethers.parseEther('1000'),
    amountB: ethers.parseEther('2000000'),
  });
  await manager.addLiquidity({
    sender: alice,
    assetA: TOKENS.USDC,
    assetB: TOKENS.DAI,
    strategy: constantProduct,
    marking: 0,
    amountA: ethers.parseEther('1000000'),
    amountB: ethers.parseEther('1000000'),
  });
  console.log(`   Pool: ${deposit.poolId}`);
  console.log(`   Shares minted: ${ethers.formatEther(deposit.shares)}`);
  console.log();

  // Example 2: Quote, then swap with a slippage floor
  console.log('--- Example 2: Swap ---');
  const swapParams = {
    sender: bob,
    assetIn: TOKENS.WETH,
    assetOut: TOKENS.USDC,
    strategy: constantProduct,
    marking: 0,
    amountIn: ethers.parseEther('1'),
  };
  const quoted = await manager.quote(swapParams);
  const swapped = await manager.swap({ ...swapParams, minAmountOut: (quoted.amountOut * 995n) / 1000n });
  console.log(`   Quoted: ${ethers.formatEther(quoted.amountOut)} USDC`);
  console.log(`   Received: ${ethers.formatEther(swapped.amountOut)} USDC`);
  console.log();

  // Example 3: Oracle-anchored pool reading bridge 1, spread bucket 5 (5 bps)
  console.log('--- Example 3: Oracle-anchored Pool ---');
  const oracleMarking = encodeMarking({
    enhancedContext: false,
    bridgeFlags: [false, true, false, false],
    bucketId: 5,
    extraSlot: 0,
  });
  await manager.addLiquidity({
    sender: alice,
    assetA: TOKENS.WETH,
    assetB: TOKENS.USDC,
    strategy: oracle,
    marking: oracleMarking,
    amountA: ethers.parseEther('1000'),
    amountB: ethers.parseEther('2000000'),
  });
  const anchored = await manager.quote({ ...swapParams, strategy: oracle, marking: oracleMarking });
  console.log(`   1 WETH -> ${ethers.formatEther(anchored.amountOut)} USDC`);
  console.log();

  // Example 4: Route WETH through USDC into DAI
  console.log('--- Example 4: Batch Swap ---');
  const batch = await manager.batchSwap({
    sender: bob,
    amountIn: ethers.parseEther('2'),
    minAmountOut: 0n,
    hops: [
      {
        assetIn: TOKENS.WETH,
        assetOut: TOKENS.USDC,
        strategy: constantProduct,
        markings: [0],
      },
      {
        assetIn: TOKENS.USDC,
        assetOut: TOKENS.DAI,
        strategy: constantProduct,
        markings: [0],
      },
    ],
  });
  console.log(`   2 WETH -> ${ethers.formatEther(batch.amountOut)} DAI over ${batch.hops.length} hops`);
  console.log();

  // Example 5: Atomic round trip settles only the net delta
  console.log('--- Example 5: Flash Session ---');
  const atomicOnly = encodeTraderProtection({ ...NO_PROTECTION, atomicExecution: true });
  const session = await manager.flashSession({
    sender: bob,
    tokens: [TOKENS.WETH, TOKENS.USDC],
    callback: {
      onFlashSession: async (owner) => {
        const out = await manager.swapWithProtection({ ...swapParams, sender: owner, minAmountOut: 0n }, atomicOnly);
        await manager.swapWithProtection(
          {
            ...swapParams,
            sender: owner,
            assetIn: TOKENS.USDC,
            assetOut: TOKENS.WETH,
            amountIn: out.amountOut,
            minAmountOut: 0n,
          },
          atomicOnly
        );
      },
    },
  });
  for (const line of session.settled) {
    console.log(`   ${line.token}: ${ethers.formatEther(line.delta)}`);
  }
  console.log();

  // Example 6: Commit in one block, reveal in the next
  console.log('--- Example 6: Commit-Reveal ---');
  const salt = ethers.hexlify(ethers.randomBytes(32));
  const nonce = manager.getCommitNonce(bob);
  const reveal = { ...swapParams, minAmountOut: 0n, nonce, salt };
  await manager.commit({
    sender: bob,
    commitment: computeCommitment({ ...reveal, zeroForOne: true, trader: bob }),
  });
  block.mine();
  const revealed = await manager.revealCommitted(reveal);
  console.log(`   Revealed swap received ${ethers.formatEther(revealed.amountOut)} USDC`);

  try {
    await manager.revealCommitted(reveal);
  } catch (error) {
    if (error instanceof AmmError) {
      console.log(`   Replay rejected: ${error.code}`);
    } else {
      throw error;
    }
  }
}

main().catch(console.error);
