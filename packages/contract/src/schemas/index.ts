/**
 * Schema barrel export.
 * All V1 wire types shared by the node and its clients.
 */

export { AddressV1, AmountV1 } from "./primitives.js";

export { DeployArgsV1, checkDeployArgs } from "./deploy.js";

export { CollectionV1, SetV1, TokenV1 } from "./collection.js";
