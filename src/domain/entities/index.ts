export { Cocktail, AlcoholKind } from './cocktail.entity';
