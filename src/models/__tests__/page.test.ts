const mockClient = {
    request: jest.fn(),
};

jest.mock("axios", () => ({
    __esModule: true,
    default: {
        create: jest.fn(() => mockClient),
    },
}));

import { fixture, reply } from "../../__tests__/helpers";
import { Session } from "../../services/session";
import { Album } from "../album";
import { Track } from "../media";
import {
    FeaturedItems,
    ItemList,
    LinkList,
    Page,
    PageItem,
    PageLink,
    PageLinks,
    TextBlock,
    UnsupportedCategory,
} from "../page";
import { Playlist } from "../playlist";

describe("Page", () => {
    let session: Session;
    let page: Page;

    beforeEach(() => {
        mockClient.request.mockReset();
        session = new Session();
        page = session.parsePage(fixture("homePage"));
    });

    it("turns each row's first module into a category", () => {
        expect(page.title).toBe("Home");
        expect(page.categories.map((category) => category.constructor)).toEqual([
            PageLinks,
            FeaturedItems,
            ItemList,
            ItemList,
            ItemList,
            TextBlock,
            LinkList,
            UnsupportedCategory,
            ItemList,
        ]);
    });

    it("iterates every entry in reading order", () => {
        const entries = [...page];

        expect(entries).toHaveLength(9);
        expect(entries[0]).toBeInstanceOf(PageLink);
        expect(entries[1]).toBeInstanceOf(PageItem);
        expect(entries[2]).toBeInstanceOf(Album);
        expect(entries[3]).toBeInstanceOf(Track);
        expect(entries[4]).toBeInstanceOf(Playlist);
        expect(entries[5]).toBeInstanceOf(Album);
        expect(entries[6]).toBe("Hello there");
        expect(entries[7]).toEqual({ type: "WEBSITE", url: "https://example.com/placeholders" });
        expect(entries[8]).toBeInstanceOf(Track);
    });

    it("drops entries of unknown types from mixed lists", () => {
        const mixed = page.categories[3];

        expect(mixed instanceof ItemList && mixed.items.length).toBe(2);
    });

    it("copies credit roles onto listed tracks", () => {
        const credits = page.categories[8];
        const track = credits instanceof ItemList ? credits.items[0] : null;

        expect(track instanceof Track && track.artistRoles).toEqual([
            { categoryId: 2, category: "Producer" },
        ]);
    });

    it("keeps the raw JSON of unsupported modules", () => {
        const unsupported = page.categories[7];

        expect(unsupported instanceof UnsupportedCategory && unsupported.raw).toEqual({
            type: "CONCERT_LIST",
            title: "Concerts",
        });
    });

    it("reads text blocks", () => {
        const block = page.categories[5];

        expect(block instanceof TextBlock && block.icon).toBe("info");
        expect(block instanceof TextBlock && block.text).toBe("Hello there");
    });

    it("follows the show more link", async () => {
        mockClient.request.mockResolvedValueOnce(reply(200, { title: "New Albums", rows: [] }));
        const albums = page.categories[2];

        const more = albums instanceof ItemList ? await albums.showMore() : null;

        expect(more?.title).toBe("New Albums");
        expect(mockClient.request.mock.calls[0][0].url).toBe(
            "https://api.tidal.com/v1/pages/new_albums",
        );
    });

    it("has nothing more to show without a link", async () => {
        const block = page.categories[5];

        await expect(block instanceof TextBlock ? block.showMore() : undefined).resolves.toBeNull();
        expect(mockClient.request).not.toHaveBeenCalled();
    });

    it("opens page links as desktop pages", async () => {
        mockClient.request.mockResolvedValueOnce(reply(200, { title: "Pop", rows: [] }));
        const link = page.categories[0];
        const target = link instanceof PageLinks ? link.items[0] : null;

        expect(target?.apiPath).toBe("pages/genre_pop");
        const loaded = await target?.get();

        expect(loaded?.title).toBe("Pop");
        expect(mockClient.request.mock.calls[0][0].params).toMatchObject({
            deviceType: "DESKTOP",
        });
    });

    it("resolves featured items to their entity", async () => {
        mockClient.request.mockResolvedValueOnce(reply(200, fixture("album")));
        const featured = page.categories[1];
        const item = featured instanceof FeaturedItems ? featured.items[0] : null;

        expect(item?.shortHeader).toBe("Night Ferry");
        expect(item?.featured).toBe(true);
        const album = await item?.get();

        expect(album).toBeInstanceOf(Album);
        expect(mockClient.request.mock.calls[0][0].url).toBe("https://api.tidal.com/v1/albums/2001");
    });

    it("refuses featured items of unknown types", async () => {
        const item = new PageItem(session, { type: "EXTERNAL", artifactId: "x" });

        await expect(item.get()).rejects.toThrow("Page item type EXTERNAL is not supported");
    });

    it("loads named pages", async () => {
        mockClient.request.mockResolvedValue(reply(200, { title: "Any", rows: [] }));

        await session.home();
        await session.videos();
        await session.genres();
        await session.localGenres();
        await session.moods();
        await session.mixes();
        await session.forYou();

        expect(mockClient.request.mock.calls.map((call) => call[0].url)).toEqual([
            "https://api.tidal.com/v1/pages/home",
            "https://api.tidal.com/v1/pages/videos",
            "https://api.tidal.com/v1/pages/genre_page",
            "https://api.tidal.com/v1/pages/genre_page_local",
            "https://api.tidal.com/v1/pages/moods",
            "https://api.tidal.com/v1/pages/my_collection_my_mixes",
            "https://api.tidal.com/v1/pages/for_you",
        ]);
    });
});
