export {
  ingestBlock,
  ingestTransaction,
  blockNodeId,
  transactionNodeId,
  addressNodeId,
} from "./blockchain-builder"
export type {
  BlockRecord,
  TransactionRecord,
  TransactionInputRecord,
  TransactionOutputRecord,
} from "./blockchain-builder"
