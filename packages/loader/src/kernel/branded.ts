type Brand<TBase, TBrand extends string> = TBase & { readonly __brand: TBrand };

export type ProvinceId = Brand<number, 'ProvinceId'>;
export type StateId = Brand<number, 'StateId'>;
export type StrategicRegionId = Brand<number, 'StrategicRegionId'>;
export type Red = Brand<number, 'Red'>;
export type Green = Brand<number, 'Green'>;
export type Blue = Brand<number, 'Blue'>;
export type ColorIndex = Brand<number, 'ColorIndex'>;
export type XCoord = Brand<number, 'XCoord'>;
export type YCoord = Brand<number, 'YCoord'>;
export type ContinentIndex = Brand<number, 'ContinentIndex'>;
export type RailLevel = Brand<number, 'RailLevel'>;
export type TreeIndex = Brand<number, 'TreeIndex'>;
export type Manpower = Brand<number, 'Manpower'>;
export type ModelIndex = Brand<number, 'ModelIndex'>;
export type PixelStep = Brand<number, 'PixelStep'>;

export type Weight = Brand<number, 'Weight'>;
export type Temperature = Brand<number, 'Temperature'>;
export type SnowLevel = Brand<number, 'SnowLevel'>;
export type VictoryPoints = Brand<number, 'VictoryPoints'>;
export type LocalSupplies = Brand<number, 'LocalSupplies'>;
export type BuildingsMaxLevelFactor = Brand<number, 'BuildingsMaxLevelFactor'>;
export type PixelDensity = Brand<number, 'PixelDensity'>;
export type Distance = Brand<number, 'Distance'>;

export type Terrain = Brand<string, 'Terrain'>;
export type ContinentName = Brand<string, 'ContinentName'>;
export type AdjacencyRuleName = Brand<string, 'AdjacencyRuleName'>;
export type BuildingId = Brand<string, 'BuildingId'>;
export type StrategicRegionName = Brand<string, 'StrategicRegionName'>;
export type StateName = Brand<string, 'StateName'>;
export type StateCategoryName = Brand<string, 'StateCategoryName'>;
export type CountryTag = Brand<string, 'CountryTag'>;
export type MeshId = Brand<string, 'MeshId'>;

export const asProvinceId = (value: number): ProvinceId => value as ProvinceId;
export const asStateId = (value: number): StateId => value as StateId;
export const asStrategicRegionId = (value: number): StrategicRegionId => value as StrategicRegionId;
export const asRed = (value: number): Red => value as Red;
export const asGreen = (value: number): Green => value as Green;
export const asBlue = (value: number): Blue => value as Blue;
export const asColorIndex = (value: number): ColorIndex => value as ColorIndex;
export const asXCoord = (value: number): XCoord => value as XCoord;
export const asYCoord = (value: number): YCoord => value as YCoord;
export const asContinentIndex = (value: number): ContinentIndex => value as ContinentIndex;
export const asRailLevel = (value: number): RailLevel => value as RailLevel;
export const asTreeIndex = (value: number): TreeIndex => value as TreeIndex;
export const asManpower = (value: number): Manpower => value as Manpower;
export const asModelIndex = (value: number): ModelIndex => value as ModelIndex;
export const asPixelStep = (value: number): PixelStep => value as PixelStep;

export const asWeight = (value: number): Weight => value as Weight;
export const asTemperature = (value: number): Temperature => value as Temperature;
export const asSnowLevel = (value: number): SnowLevel => value as SnowLevel;
export const asVictoryPoints = (value: number): VictoryPoints => value as VictoryPoints;
export const asLocalSupplies = (value: number): LocalSupplies => value as LocalSupplies;
export const asBuildingsMaxLevelFactor = (value: number): BuildingsMaxLevelFactor => value as BuildingsMaxLevelFactor;
export const asPixelDensity = (value: number): PixelDensity => value as PixelDensity;
export const asDistance = (value: number): Distance => value as Distance;

export const asTerrain = (value: string): Terrain => value as Terrain;
export const asContinentName = (value: string): ContinentName => value as ContinentName;
export const asAdjacencyRuleName = (value: string): AdjacencyRuleName => value as AdjacencyRuleName;
export const asBuildingId = (value: string): BuildingId => value as BuildingId;
export const asStrategicRegionName = (value: string): StrategicRegionName => value as StrategicRegionName;
export const asStateName = (value: string): StateName => value as StateName;
export const asStateCategoryName = (value: string): StateCategoryName => value as StateCategoryName;
export const asCountryTag = (value: string): CountryTag => value as CountryTag;
export const asMeshId = (value: string): MeshId => value as MeshId;
