import { SchedulingOp, SchedulingRepository } from '../repositories/schedulingRepository';
import { TransactionType, WalletTransaction } from '../types';
import { InsufficientFundsError, ValidationError } from '../utils/errors';
import { roundMoney } from '../utils/money';

export interface WalletSummary {
    user_id: string;
    balance: number;
    transactions: WalletTransaction[];
}

/**
 * Stored-value wallet. The op builders let other services fold a wallet
 * movement into their own batch; `credit` and `withdraw` commit on their own.
 */
export class WalletService {
    constructor(private readonly repository: SchedulingRepository) {}

    async getBalance(userId: string): Promise<number> {
        const wallet = await this.repository.getWallet(userId);
        return wallet?.balance ?? 0;
    }

    async getWallet(userId: string): Promise<WalletSummary> {
        const [balance, transactions] = await Promise.all([
            this.getBalance(userId),
            this.listTransactions(userId),
        ]);
        return { user_id: userId, balance, transactions };
    }

    async listTransactions(userId: string): Promise<WalletTransaction[]> {
        return this.repository.listWalletTransactions(userId);
    }

    creditOp(userId: string, amount: number, type: TransactionType, description: string, referenceId: string | null = null): SchedulingOp {
        return { kind: 'wallet_credit', user_id: userId, amount: roundMoney(amount), tx_type: type, description, reference_id: referenceId };
    }

    /**
     * Builds a debit after checking the current balance. The repository checks
     * again when applying it, so a concurrent spend cannot overdraw the wallet.
     */
    async debitOp(userId: string, amount: number, description: string, referenceId: string | null = null): Promise<SchedulingOp> {
        const requested = roundMoney(amount);
        if (requested <= 0) {
            throw new ValidationError('INVALID_AMOUNT', 'Withdrawal amount must be positive');
        }
        const balance = await this.getBalance(userId);
        if (balance < requested) {
            throw new InsufficientFundsError(balance, requested);
        }
        return { kind: 'wallet_debit', user_id: userId, amount: requested, description, reference_id: referenceId };
    }

    async credit(userId: string, amount: number, type: TransactionType, description: string, referenceId: string | null = null): Promise<number> {
        if (roundMoney(amount) <= 0) {
            throw new ValidationError('INVALID_AMOUNT', 'Credit amount must be positive');
        }
        await this.repository.commit([this.creditOp(userId, amount, type, description, referenceId)]);
        return this.getBalance(userId);
    }

    async withdraw(userId: string, amount: number, description: string, referenceId: string | null = null): Promise<number> {
        await this.repository.commit([await this.debitOp(userId, amount, description, referenceId)]);
        return this.getBalance(userId);
    }
}
