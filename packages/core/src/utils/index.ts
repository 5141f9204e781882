export { formatTable, renderCell } from "./format-table.js";
export { sha512Hex } from "./hash.js";
