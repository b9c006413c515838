import { keccak } from "../core/hash";
import { type Address, type CodeHash, type Hex, asCodeHash } from "../types/brands";
import { addressToBytes, bytesToHex, concatBytes, hexToBytes, toAddress, utf8 } from "../utils/bytes";

const ADDRESS_DOMAIN = utf8("contract_addr_v1");

export const codeHashOf = (code: Uint8Array): CodeHash => asCodeHash(bytesToHex(keccak(code)));

/** keccak256("contract_addr_v1" ++ deployer ++ codeHash ++ salt) */
export const contractAddress = (deployer: Address, codeHash: Hex, salt: Uint8Array): Address =>
  toAddress(
    keccak(concatBytes(ADDRESS_DOMAIN, addressToBytes(deployer), hexToBytes(codeHash), salt)),
  );
