/**
 * Mangaaku CSS Selectors
 *
 * The site runs a WordPress manga theme. Listing and search result pages share
 * the `.bsx` card markup; detail and reader pages share `h1.entry-title`.
 * The markup is not under our control, so every rule treats these as
 * best-effort anchors.
 */

export const SELECTORS = {
  listing: {
    // One card per catalog entry
    entry: 'div.bsx',
    link: 'a',
    image: 'img',
    rating: '.numscore',
    chapterBadge: '.epxs',
  },

  detail: {
    title: 'h1.entry-title',
    cover: 'img.attachment-.size-.wp-post-image',
    rating: 'div.num',
    // Each .mgen may hold several genre links
    genreLinks: 'span.mgen a',
    synopsis: 'div.entry-content.entry-content-single',
    synopsisNoise: 'script, style',
    // First link of each row; the first row is the "latest chapter" shortcut
    chapterRows: 'div.eph-num',
    chapterLink: 'a',
    infoBlock: 'div.tsinfo.bixbox',
  },

  reader: {
    title: 'h1.entry-title',
  },
} as const

/** Literal call that carries the reader's mirror list as a JSON object */
export const READER_PAYLOAD_PATTERN = /ts_reader\.run\((\{.*?\})\);/s
