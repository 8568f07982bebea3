/**
 * Page Data Types
 *
 * RawDocument is what the collector hands over; ParsedDocument is the
 * normalized view every analyzer reads.
 */

export interface RedirectInfo {
  url: string
  statusCode: number
}

/**
 * Fetched page as returned by the collector. Consumed once by the processor.
 */
export interface RawDocument {
  url: string
  finalUrl: string
  statusCode: number
  // Header names are lower-cased
  headers: Record<string, string>
  body: string
  contentType: string
  byteLength: number
  fetchedAt: Date
  responseTimeMs: number
  redirectChain: RedirectInfo[]
  truncated: boolean
}

export interface MetaTag {
  name?: string
  property?: string
  httpEquiv?: string
  content: string
}

export interface HeadingData {
  level: number
  text: string
}

export interface HeadingNode extends HeadingData {
  children: HeadingNode[]
}

export interface HreflangEntry {
  lang: string
  url: string
}

export interface LinkData {
  href: string
  text: string
  rel: string[]
  internal: boolean
  nofollow: boolean
  ariaLabel?: string
  hasImageWithAlt: boolean
  target?: string
}

export interface ImageData {
  src: string
  // null when the alt attribute is missing entirely
  alt: string | null
  width?: number
  height?: number
  loading?: string
  srcset?: string
  inPicture: boolean
}

export interface ScriptData {
  src?: string
  type?: string
  async: boolean
  defer: boolean
  inline: boolean
  inHead: boolean
  // Characters of inline code, 0 for external scripts
  size: number
}

export interface StylesheetData {
  href: string
  media?: string
  inHead: boolean
}

export interface FormField {
  type: string
  name?: string
  id?: string
  labelled: boolean
}

export interface FormData {
  action: string
  method: string
  fields: FormField[]
}

export interface IframeData {
  src: string
  title?: string
}

export interface ButtonData {
  text: string
  ariaLabel?: string
}

export interface TableData {
  hasHeaderCells: boolean
  hasCaption: boolean
  responsive: boolean
}

export interface LandmarkData {
  main: boolean
  nav: boolean
  header: boolean
  footer: boolean
  roles: string[]
}

export interface InlineStyle {
  tag: string
  style: string
}

export interface IconData {
  favicon: boolean
  appleTouchIcon: boolean
  manifest: boolean
}

export interface StructuredDataBlock {
  format: 'json-ld' | 'microdata'
  types: string[]
  data?: Record<string, unknown>
  error?: string
}

export type ParserName = 'parse5' | 'htmlparser2'

export interface DocumentMetadata {
  parser: ParserName | 'fallback'
  warnings: string[]
  commentsRemoved: boolean
  whitespaceCleaned: boolean
}

/**
 * Normalized structural view of a page.
 *
 * Shared read-only by every analyzer of one request; the processor freezes it
 * before handing it out.
 */
export interface ParsedDocument {
  url: string
  finalUrl: string
  statusCode: number
  headers: Record<string, string>
  contentType: string
  fetchedAt: Date
  responseTimeMs: number
  htmlSize: number
  redirectChain: RedirectInfo[]

  baseUrl: string
  title?: string
  titleCount: number
  lang?: string
  charset?: string

  meta: MetaTag[]
  description?: string
  robots?: string
  viewport?: string
  keywords?: string
  themeColor?: string

  canonical?: string
  hreflang: HreflangEntry[]

  headings: HeadingData[]
  headingTree: HeadingNode[]

  links: LinkData[]
  images: ImageData[]
  scripts: ScriptData[]
  stylesheets: StylesheetData[]
  forms: FormData[]
  iframes: IframeData[]
  buttons: ButtonData[]
  tables: TableData[]

  landmarks: LandmarkData
  hasSkipLink: boolean
  positiveTabindexCount: number

  inlineStyles: InlineStyle[]
  styleBlocks: string[]
  icons: IconData

  structuredData: StructuredDataBlock[]
  openGraph: Record<string, string>
  twitterCard: Record<string, string>

  text: string
  wordCount: number
  html: string

  metadata: DocumentMetadata
}
