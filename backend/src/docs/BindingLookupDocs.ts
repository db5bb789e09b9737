export default `# Token-Bound Binding Lookup

Indexes the events of a token-bound achievement ledger.

Achievements are multi-token units minted with a price and a permanence flag. A holder binds one unit to an external NFT they own, identified by its contract address and token id; the unit then sits in the ledger's custody until it is unbound. Permanent achievements stay bound forever.

## Indexed Events

- **MintTokenBoundToken**: records the achievement's terms (recipient, amount, price, permanence).
- **BindTokenBoundToken**: stores a live binding with its operator and URI.
- **UnbindTokenBoundToken**: removes the live binding.
- **PurchaseTokenBoundToken**: appends to the achievement's purchase log.

## Queries

Send \`{ service: 'ls_token_bound', query }\` where \`query\` may contain:

- \`contractAddress\`: hex address of the external NFT contract
- \`tokenId\`: decimal token id on that contract
- \`achievementId\`: decimal achievement id
- \`operator\`: hex address of the account that bound
- \`limit\` (default 50), \`skip\` (default 0), \`sortOrder\` (\`asc\` or \`desc\`, default \`desc\`)

All filters are optional and combine with AND. Addresses match regardless of case.`
