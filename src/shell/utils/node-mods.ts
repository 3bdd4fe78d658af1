/**
 * CHANGE: Централизованные ре-экспорты Node built-ins для shell-слоя
 * WHY: Один модуль импортирует child_process/fs/os/path; остальные берут отсюда
 * REF: REQ-SHELL-NODE-MODS
 *
 * Инвариант: экспортируем совместимые объекты/функции, избегая `export *` для модулей с `export =`.
 */
import * as fsNS from "node:fs";
import * as fsPromisesNS from "node:fs/promises";
import * as osNS from "node:os";
import * as pathNS from "node:path";

export { spawn } from "node:child_process";

// CHANGE: Ре-экспорт через константы вместо `export *`
// REF: TypeScript limitation for `export =`
export const fs = fsNS;
export const fsp = fsPromisesNS;
export const os = osNS;
export const path = pathNS;
