/**
 * Catalog Normalizer Tests
 */
import { describe, it, expect } from 'vitest';
import { normalizeRecord, parseReleaseDate } from '../../src/normalizers/catalog.normalizer.js';
import { extractSampleImages, upgradeImageUrl } from '../../src/normalizers/image-urls.js';
import { MalformedRecordError } from '../../src/errors.js';
import { makeRawRecord } from '../helpers/fixtures.js';

describe('Catalog Normalizer', () => {
    describe('normalizeRecord', () => {
        it('should map a complete record', () => {
            const item = normalizeRecord(makeRawRecord('abc00123', {
                maker: { name: 'Direct Maker' },
                iteminfo: {
                    maker: [{ name: 'Fallback Maker' }],
                    actress: [{ name: 'Actress One' }, { name: ' Actress Two ' }, { name: 'Actress One' }],
                    genre: [{ name: 'Drama' }, { name: 'Comedy' }, { name: 'Drama' }],
                },
            }));

            expect(item).toEqual({
                externalId: 'abc00123',
                productCode: 'abc00123',
                title: 'Title abc00123',
                maker: 'Direct Maker',
                actresses: ['Actress One', 'Actress Two'],
                genres: ['Drama', 'Comedy'],
                releaseDate: new Date(Date.UTC(2024, 4, 10)),
                productUrl: 'https://www.example.test/detail/cid=abc00123/',
                coverImageUrl: 'https://pics.example.test/abc00123/abc00123pl.jpg',
                sampleImageUrls: [
                    'https://pics.example.test/abc00123/abc00123jp-1.jpg',
                    'https://pics.example.test/abc00123/abc00123-1.jpg',
                ],
            });
        });

        it('should be deterministic for the same record', () => {
            const raw = makeRawRecord('abc00123');

            expect(normalizeRecord(raw)).toEqual(normalizeRecord(raw));
        });

        it('should fall back to cid and the first listed maker', () => {
            const item = normalizeRecord({
                cid: ' xyz00001 ',
                title: 'Only Required Fields',
                iteminfo: { maker: [{ name: 'Listed Maker' }] },
            });

            expect(item.externalId).toBe('xyz00001');
            expect(item.maker).toBe('Listed Maker');
        });

        it('should tolerate every optional field being absent', () => {
            const item = normalizeRecord({ content_id: 'xyz00001', title: 'Bare' });

            expect(item).toEqual({
                externalId: 'xyz00001',
                productCode: 'xyz00001',
                title: 'Bare',
                maker: '',
                actresses: [],
                genres: [],
                releaseDate: null,
                productUrl: '',
                coverImageUrl: null,
                sampleImageUrls: [],
            });
        });

        it('should treat wrongly typed optional fields as absent', () => {
            const item = normalizeRecord({
                content_id: 'xyz00001',
                title: 'Odd',
                date: 20240101,
                iteminfo: { genre: 'not-a-list' },
                imageURL: 'not-an-object',
            });

            expect(item.releaseDate).toBeNull();
            expect(item.genres).toEqual([]);
            expect(item.coverImageUrl).toBeNull();
        });

        it('should use the affiliate URL when URL is absent', () => {
            const item = normalizeRecord({
                content_id: 'xyz00001',
                title: 'Linked',
                affiliateURL: 'https://al.example.test/?lurl=x',
            });

            expect(item.productUrl).toBe('https://al.example.test/?lurl=x');
        });

        it('should reject a record without a product code', () => {
            expect(() => normalizeRecord({ title: 'No Code' })).toThrow(MalformedRecordError);
            expect(() => normalizeRecord({ content_id: '   ', title: 'Blank Code' })).toThrow('Record has no content_id');
        });

        it('should reject a record without a title', () => {
            expect(() => normalizeRecord({ content_id: 'xyz00001' })).toThrow('Record has no title');
        });
    });

    describe('parseReleaseDate', () => {
        it('should keep only the date part at UTC midnight', () => {
            expect(parseReleaseDate('2024-02-29 10:00:00')).toEqual(new Date('2024-02-29T00:00:00.000Z'));
        });

        it('should return null for impossible or missing dates', () => {
            expect(parseReleaseDate('2023-02-29 10:00:00')).toBeNull();
            expect(parseReleaseDate('soon')).toBeNull();
            expect(parseReleaseDate(undefined)).toBeNull();
        });
    });

    describe('upgradeImageUrl', () => {
        it('should add https to protocol-relative URLs', () => {
            expect(upgradeImageUrl('//pics.example.test/a/apl.jpg')).toBe('https://pics.example.test/a/apl.jpg');
        });

        it('should upgrade small package art to the large variant', () => {
            expect(upgradeImageUrl('https://pics.example.test/abc00123/abc00123ps.jpg')).toBe(
                'https://pics.example.test/abc00123/abc00123pl.jpg'
            );
        });

        it('should upgrade small CDN sample frames and keep only the webp hint', () => {
            expect(upgradeImageUrl('https://awsimgsrc.dmm.co.jp/pics_dig/digital/video/abc00123/abc00123-3.jpg?w=120&f=webp')).toBe(
                'https://awsimgsrc.dmm.co.jp/pics_dig/digital/video/abc00123/abc00123jp-3.jpg?f=webp'
            );
            expect(upgradeImageUrl('https://awsimgsrc.dmm.co.jp/pics_dig/digital/video/abc00123/abc00123-3.jpg?w=120')).toBe(
                'https://awsimgsrc.dmm.co.jp/pics_dig/digital/video/abc00123/abc00123jp-3.jpg'
            );
        });

        it('should leave large frames alone', () => {
            const url = 'https://awsimgsrc.dmm.co.jp/pics_dig/digital/video/abc00123/abc00123jp-3.jpg';
            expect(upgradeImageUrl(url)).toBe(url);
        });
    });

    describe('extractSampleImages', () => {
        it('should list large samples first, de-duplicate and keep order', () => {
            const samples = extractSampleImages({
                sample_s: { image: ['https://pics.example.test/s/1.jpg', 'https://pics.example.test/l/1.jpg'] },
                sample_l: { image: ['https://pics.example.test/l/1.jpg', 'https://pics.example.test/l/2.jpg'] },
            });

            expect(samples).toEqual([
                'https://pics.example.test/l/1.jpg',
                'https://pics.example.test/l/2.jpg',
                'https://pics.example.test/s/1.jpg',
            ]);
        });

        it('should drop non-image and placeholder URLs', () => {
            const samples = extractSampleImages({
                sample_l: {
                    image: [
                        'https://pics.example.test/l/1.jpg',
                        'https://pics.example.test/movie.mp4',
                        'https://pics.example.test/now_printing.jpg',
                        '',
                    ],
                },
            });

            expect(samples).toEqual(['https://pics.example.test/l/1.jpg']);
        });

        it('should return an empty list for a missing block', () => {
            expect(extractSampleImages(undefined)).toEqual([]);
        });
    });
});
