/**
 * @subnetkit/codec
 *
 * Binary transaction formats of the platform, exchange and contract
 * chains, plus chain detection over raw bytes.
 */

export { TransactionCodecError } from "./errors.js";
export type { TransactionCodecErrorCode } from "./errors.js";

export { Reader, Writer, decodeWith, encodeWith, expectTypeId } from "./packer.js";
export type { Codec } from "./packer.js";

export { CODEC_VERSION } from "./framing.js";
export { assertNever } from "./assert.js";

export {
  ID_LEN,
  NODE_ID_LEN,
  SHORT_ID_LEN,
  bytesEqual,
  cb58Decode,
  cb58Encode,
  compareBytes,
  computeTxId,
  formatAddress,
  fromHex,
  isAllZero,
  parseAddress,
  toHex,
} from "./encoding.js";
export type { ParsedAddress } from "./encoding.js";

export { EMPTY_SIGNATURE, FX_TYPE_IDS, SIGNATURE_LEN } from "./components.js";
export type {
  BaseTxFields,
  Credential,
  Input,
  OutputOwners,
  TransferableInput,
  TransferableOutput,
  TransferInput,
  TransferOutput,
  UtxoId,
  Validator,
} from "./components.js";

export * from "./pchain/index.js";
export * from "./xchain/index.js";
export * from "./cchain/index.js";

export {
  CCHAIN_CODEC,
  DEFAULT_CHAIN_CODECS,
  PCHAIN_CODEC,
  XCHAIN_CODEC,
  decodeTx,
  detectChain,
  extractNetworkId,
  networkIdOf,
} from "./detect.js";
export type { ChainCodec, DecodedTx } from "./detect.js";
