/**
 * Payment Processor
 *
 * Accepts presale payments in the native currency or the project token.
 * A flat fee (not a percentage) goes to the fee recipient; the rest goes
 * to the treasury.
 */

import {
  FEES,
  NATIVE_CURRENCY,
  StakelineError,
  unwrapArithmetic,
  checkedSub,
  presaleLogger as logger,
  type PaymentRequest,
} from "@stakeline/shared";
import type { Transaction } from "../transaction.js";
import type { PaymentResult } from "../types.js";

const paymentLogger = logger.child({ component: "payment-processor" });

// ============================================
// PAYMENT PROCESSOR
// ============================================

export class PaymentProcessor {
  private readonly flatFee: bigint;

  constructor(flatFee: bigint = FEES.flatPaymentFee) {
    this.flatFee = flatFee;
  }

  async acceptPayment(tx: Transaction, request: PaymentRequest): Promise<PaymentResult> {
    const { treasury, feeRecipient } = tx.config.addresses;

    if (request.feeRecipient !== feeRecipient || request.treasury !== treasury) {
      throw new StakelineError("InvalidFeeRecipient", undefined, {
        feeRecipient: request.feeRecipient,
        treasury: request.treasury,
      });
    }

    const isNative = request.currency === NATIVE_CURRENCY;
    if (!isNative && request.currency !== tx.config.tokenMint) {
      throw new StakelineError("InvalidTokenMint", undefined, { currency: request.currency });
    }

    if (request.amount <= this.flatFee) {
      throw new StakelineError("InvalidAmount", `Payment must exceed the flat fee of ${this.flatFee}.`, {
        amount: request.amount.toString(),
      });
    }

    if (!isNative) {
      const balance = await tx.balanceOf({ owner: tx.caller, asset: request.currency });
      if (balance < request.amount) {
        throw new StakelineError("InsufficientFunds", undefined, {
          balance: balance.toString(),
          amount: request.amount.toString(),
        });
      }
    }

    const net = unwrapArithmetic(checkedSub(request.amount, this.flatFee));

    tx.transfer(request.currency, tx.caller, treasury, net);
    tx.transfer(request.currency, tx.caller, feeRecipient, this.flatFee);

    tx.record({
      type: "payment:accepted",
      payer: tx.caller,
      currency: request.currency,
      net,
      fee: this.flatFee,
      at: tx.now,
    });

    paymentLogger.info({
      payer: tx.caller,
      currency: isNative ? NATIVE_CURRENCY : "token",
      net: net.toString(),
      fee: this.flatFee.toString(),
    }, "Payment accepted");

    return { currency: request.currency, net, fee: this.flatFee };
  }

  /**
   * Direct treasury funding in the native currency; no fee split
   */
  depositNative(tx: Transaction, amount: bigint): void {
    tx.transfer(NATIVE_CURRENCY, tx.caller, tx.config.addresses.treasury, amount);

    tx.record({ type: "treasury:deposited", payer: tx.caller, amount, at: tx.now });

    paymentLogger.info({
      payer: tx.caller,
      amount: amount.toString(),
    }, "Native deposit to treasury");
  }
}

export function createPaymentProcessor(flatFee?: bigint): PaymentProcessor {
  return new PaymentProcessor(flatFee);
}
