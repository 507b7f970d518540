/**
 * Minimal token ABIs - only balanceOf
 */
export const ERC20BalanceOf = {
  name: "balanceOf",
  type: "function",
  stateMutability: "view",
  inputs: [{ name: "_owner", type: "address" }],
  outputs: [{ name: "balance", type: "uint256" }],
} as const;

// ERC-721 shares the ERC-20 signature; counts tokens owned
export const ERC721BalanceOf = ERC20BalanceOf;

export const ERC1155BalanceOf = {
  name: "balanceOf",
  type: "function",
  stateMutability: "view",
  inputs: [
    { name: "_owner", type: "address" },
    { name: "_id", type: "uint256" },
  ],
  outputs: [{ name: "", type: "uint256" }],
} as const;
