import { getComponentLogger } from '../logging/logger.js';
import { FundsTransferGateway, TransferReceipt, TransferRequest } from './transferGateway.js';

const logger = getComponentLogger('LoggedTransferGateway');

/**
 * Gateway for deployments where disbursement happens downstream of the
 * event outbox: each instruction is logged and acknowledged at once.
 */
export class LoggedTransferGateway implements FundsTransferGateway {
    async transfer(request: TransferRequest): Promise<TransferReceipt> {
        logger.info({
            reference: request.reference,
            to: request.to,
            amount: request.amount.toString()
        }, 'Transfer instruction issued');

        return { reference: request.reference };
    }
}
