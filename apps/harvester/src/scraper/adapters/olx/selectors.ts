export const SELECTORS = {
  // Search results: one card per listing.
  searchCard: 'li[data-aut-id="itemBox"]',
  cardLink: 'a[data-aut-id="itemAd"], a[href]',
  cardTitle: '[data-aut-id="itemTitle"]',
  cardPrice: '[data-aut-id="itemPrice"]',
  cardLocation: '[data-aut-id="item-location"]',
  nextPage: 'link[rel="next"], a[rel="next"], a[data-aut-id="arrowRight"]',

  // Listing detail page.
  title: 'h1[data-aut-id="itemTitle"], [data-aut-id="itemTitle"]',
  description: '[data-aut-id="itemDescriptionContent"], [data-aut-id="itemDescription"]',
  price: '[data-aut-id="itemPrice"]',
  location: '[data-aut-id="itemLocation"], [data-aut-id="item-location"]',
  images: '[data-aut-id="itemImage"] img, img[data-aut-id="itemImage"], figure img',
  jsonLd: 'script[type="application/ld+json"]',
} as const
