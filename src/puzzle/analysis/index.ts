export { checkSolvability, countInversions, flattenTiles, findBlank } from './Solvability';
export { validateBoard } from './BoardValidator';
